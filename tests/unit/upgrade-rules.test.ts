import { describe, it } from 'node:test'
import { UPGRADE_RULES, rulesBetween } from '../../config/upgrade-rules'
import { applyUpgradeRules, filterGlobals } from '../../core/cluster-upgrade'
import { ConfigDocument } from '../../core/conf-file'
import { assert, assertDeepEqual, assertEqual } from '../utils/assertions'

function upgradeConf(text: string, from: string, to: string): { text: string; applied: string[] } {
  const doc = ConfigDocument.parse(text)
  const applied = applyUpgradeRules(doc, rulesBetween(from, to))
  return { text: doc.render(), applied }
}

describe('rulesBetween', () => {
  it('should select rules newer than the old version up to the new one', () => {
    assertDeepEqual(
      rulesBetween('15', '16').map((rule) => rule.key),
      ['force_parallel_mode', 'promote_trigger_file', 'vacuum_defer_cleanup_age'],
      'Rules introduced in 16',
    )
  })

  it('should select nothing between equal versions', () => {
    assertEqual(rulesBetween('16', '16').length, 0, 'No rules')
  })

  it('should order rules across old-style and new-style versions', () => {
    const keys = rulesBetween('9.4', '10').map((rule) => rule.key)
    assertDeepEqual(
      keys,
      ['checkpoint_segments', 'min_parallel_relation_size', 'sql_inheritance'],
      '9.5 rules come before 10 rules',
    )
  })

  it('should give every rename and recompute rule a new key', () => {
    for (const rule of UPGRADE_RULES) {
      if (rule.kind !== 'deprecate') {
        assert(rule.newKey !== undefined, `${rule.key} has a new key`)
      }
    }
  })
})

describe('applyUpgradeRules', () => {
  it('should convert checkpoint_segments to max_wal_size', () => {
    const result = upgradeConf('checkpoint_segments = 10\n', '9.4', '9.5')

    assertEqual(
      result.text,
      '#checkpoint_segments = 10 #replaced by max_wal_size in 9.5\nmax_wal_size = 480MB\n',
      'Three segments of 16MB per checkpoint segment',
    )
    assertDeepEqual(
      result.applied,
      ['checkpoint_segments: replaced by max_wal_size in 9.5'],
      'Applied rules',
    )
  })

  it('should disable a setting that is gone in the new version', () => {
    const result = upgradeConf("stats_temp_directory = '/var/run/postgresql/14-main.pg_stat_tmp'\n", '14', '16')

    assertEqual(
      result.text,
      "#stats_temp_directory = '/var/run/postgresql/14-main.pg_stat_tmp' #not available in 15 or later\n",
      'Commented out with the reason',
    )
  })

  it('should disable a recomputed setting whose value is not a number', () => {
    const result = upgradeConf('wal_keep_segments = lots\n', '12', '13')

    assertEqual(
      result.text,
      '#wal_keep_segments = lots #replaced by wal_keep_size in 13\n',
      'No replacement value',
    )
  })

  it('should rename a setting keeping its value', () => {
    const result = upgradeConf('force_parallel_mode = on\nport = 5432\n', '15', '16')

    assertEqual(
      result.text,
      '#force_parallel_mode = on #renamed in 16\ndebug_parallel_query = on\nport = 5432\n',
      'Renamed setting',
    )
  })

  it('should leave a configuration without old settings alone', () => {
    const text = 'port = 5432\nshared_buffers = 128MB\n'
    const result = upgradeConf(text, '9.4', '17')

    assertEqual(result.text, text, 'Unchanged text')
    assertEqual(result.applied.length, 0, 'Nothing applied')
  })
})

describe('filterGlobals', () => {
  const dump = [
    'CREATE ROLE postgres;',
    'ALTER ROLE postgres WITH SUPERUSER INHERIT CREATEROLE CREATEDB LOGIN REPLICATION BYPASSRLS;',
    "ALTER ROLE postgres SET default_transaction_read_only TO 'on';",
    'CREATE ROLE app;',
    'ALTER ROLE app WITH NOSUPERUSER LOGIN;',
    '',
  ].join('\n')

  it('should drop the owner role and hold back its read-only default', () => {
    const { script, deferred } = filterGlobals(dump, 'postgres')

    assertEqual(
      script,
      [
        'ALTER ROLE postgres WITH SUPERUSER INHERIT CREATEROLE CREATEDB LOGIN REPLICATION BYPASSRLS;',
        'CREATE ROLE app;',
        'ALTER ROLE app WITH NOSUPERUSER LOGIN;',
        '',
      ].join('\n'),
      'Filtered script',
    )
    assertDeepEqual(
      deferred,
      ["ALTER ROLE postgres SET default_transaction_read_only TO 'on';"],
      'Deferred statements',
    )
  })

  it('should recognize a quoted owner name', () => {
    const { script } = filterGlobals('CREATE ROLE "postgres";\nCREATE ROLE "postgres2";\n', 'postgres')

    assertEqual(script, 'CREATE ROLE "postgres2";\n', 'Only the owner is dropped')
  })
})
