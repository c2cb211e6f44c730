/**
 * postgresql.conf changes between major versions
 *
 * A rule applies to an upgrade from `old` to `new` when
 * old < since <= new. Rules are applied in table order.
 */

import { compareVersions } from '../core/version-utils'

export type UpgradeRuleKind = 'deprecate' | 'rename' | 'recompute'

export type UpgradeRule = {
  since: string
  kind: UpgradeRuleKind
  key: string
  reason: string
  // rename and recompute
  newKey?: string
  // recompute: value for newKey from the old value; null drops the setting
  compute?: (value: string) => string | null
}

const WAL_SEGMENT_MB = 16

function segmentsToMegabytes(factor: number) {
  return (value: string): string | null => {
    const segments = Number.parseInt(value, 10)
    if (Number.isNaN(segments)) return null
    return `${factor * segments * WAL_SEGMENT_MB}MB`
  }
}

export const UPGRADE_RULES: readonly UpgradeRule[] = [
  // 9.0
  { since: '9.0', kind: 'deprecate', key: 'add_missing_from', reason: 'not available in 9.0 or later' },
  { since: '9.0', kind: 'deprecate', key: 'regex_flavor', reason: 'not available in 9.0 or later' },

  // 9.2
  { since: '9.2', kind: 'deprecate', key: 'wal_sender_delay', reason: 'not available in 9.2 or later' },
  { since: '9.2', kind: 'deprecate', key: 'silent_mode', reason: 'not available in 9.2 or later' },
  { since: '9.2', kind: 'deprecate', key: 'custom_variable_classes', reason: 'not available in 9.2 or later' },

  // 9.3
  {
    since: '9.3',
    kind: 'rename',
    key: 'unix_socket_directory',
    newKey: 'unix_socket_directories',
    reason: 'deprecated in favor of unix_socket_directories',
  },
  { since: '9.3', kind: 'deprecate', key: 'replication_timeout', reason: 'not available in 9.3 or later' },

  // 9.4
  { since: '9.4', kind: 'deprecate', key: 'krb_srvname', reason: 'native krb5 authentication deprecated in favor of GSSAPI' },

  // 9.5
  {
    since: '9.5',
    kind: 'recompute',
    key: 'checkpoint_segments',
    newKey: 'max_wal_size',
    reason: 'replaced by max_wal_size in 9.5',
    // (3 * checkpoint_segments) segments of 16MB
    compute: segmentsToMegabytes(3),
  },

  // 10
  {
    since: '10',
    kind: 'rename',
    key: 'min_parallel_relation_size',
    newKey: 'min_parallel_table_scan_size',
    reason: 'renamed in 10',
  },
  { since: '10', kind: 'deprecate', key: 'sql_inheritance', reason: 'not available in 10 or later' },

  // 11
  { since: '11', kind: 'deprecate', key: 'replacement_sort_tuples', reason: 'not available in 11 or later' },

  // 12
  { since: '12', kind: 'deprecate', key: 'default_with_oids', reason: 'not available in 12 or later' },

  // 13
  {
    since: '13',
    kind: 'recompute',
    key: 'wal_keep_segments',
    newKey: 'wal_keep_size',
    reason: 'replaced by wal_keep_size in 13',
    compute: segmentsToMegabytes(1),
  },

  // 14
  { since: '14', kind: 'deprecate', key: 'operator_precedence_warning', reason: 'not available in 14 or later' },
  { since: '14', kind: 'deprecate', key: 'vacuum_cleanup_index_scale_factor', reason: 'not available in 14 or later' },

  // 15
  { since: '15', kind: 'deprecate', key: 'stats_temp_directory', reason: 'not available in 15 or later' },

  // 16
  {
    since: '16',
    kind: 'rename',
    key: 'force_parallel_mode',
    newKey: 'debug_parallel_query',
    reason: 'renamed in 16',
  },
  { since: '16', kind: 'deprecate', key: 'promote_trigger_file', reason: 'not available in 16 or later' },
  { since: '16', kind: 'deprecate', key: 'vacuum_defer_cleanup_age', reason: 'not available in 16 or later' },

  // 17
  { since: '17', kind: 'deprecate', key: 'old_snapshot_threshold', reason: 'not available in 17 or later' },
  { since: '17', kind: 'deprecate', key: 'db_user_namespace', reason: 'not available in 17 or later' },
  { since: '17', kind: 'deprecate', key: 'trace_recovery_messages', reason: 'not available in 17 or later' },
]

/**
 * Rules for an upgrade from `oldVersion` to `newVersion`, in table order
 */
export function rulesBetween(
  oldVersion: string,
  newVersion: string,
  rules: readonly UpgradeRule[] = UPGRADE_RULES,
): UpgradeRule[] {
  return rules.filter(
    (rule) =>
      compareVersions(oldVersion, rule.since) < 0 &&
      compareVersions(rule.since, newVersion) <= 0,
  )
}
