import { describe, it } from 'node:test'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  injectSuperuserRule,
  parseHbaLine,
  readHbaFile,
  restrictedHbaRules,
  rewriteTrustRules,
} from '../../core/hba'
import { assert, assertDeepEqual, assertEqual, assertNullish } from '../utils/assertions'

const HBA = `# TYPE  DATABASE        USER            ADDRESS                 METHOD

local   all             all                                     peer
host    all             all             127.0.0.1/32            scram-sha-256
`

const SUPERUSER_RULE = 'local   all             postgres                                peer'

describe('parseHbaLine', () => {
  it('should parse a local rule', () => {
    const entry = parseHbaLine('local   all   all   peer')
    assertDeepEqual(
      entry,
      { type: 'local', line: 'local   all   all   peer', db: 'all', user: 'all', method: 'peer' },
      'Local rule fields',
    )
  })

  it('should parse a host rule with a CIDR address', () => {
    const entry = parseHbaLine('host all all 127.0.0.1/32 scram-sha-256')
    assertEqual(entry.type, 'host', 'Type')
    assertEqual(entry.ip, '127.0.0.1', 'Address')
    assertEqual(entry.mask, '32', 'Prefix length')
    assertEqual(entry.method, 'scram-sha-256', 'Method')
  })

  it('should parse a host rule with a separate netmask', () => {
    const entry = parseHbaLine('hostssl all app 10.0.0.0 255.0.0.0 md5')
    assertEqual(entry.type, 'hostssl', 'Type')
    assertEqual(entry.user, 'app', 'User')
    assertEqual(entry.mask, '255.0.0.0', 'Netmask')
    assertEqual(entry.method, 'md5', 'Method')
  })

  it('should keep an authentication option with the method', () => {
    assertEqual(
      parseHbaLine('local all all peer map=admins').method,
      'peer map=admins',
      'Method with option',
    )
  })

  it('should classify comments and blank lines', () => {
    assertEqual(parseHbaLine('# a comment').type, 'comment', 'Comment')
    assertEqual(parseHbaLine('   ').type, 'comment', 'Blank line')
  })

  it('should reject unknown methods and connection types', () => {
    assertEqual(parseHbaLine('local all all magic').type, null, 'Unknown method')
    assertEqual(parseHbaLine('remote all all 1.2.3.4/32 md5').type, null, 'Unknown type')
    assertEqual(parseHbaLine('host all all 1.2.3.4/x md5').type, null, 'Bad prefix length')
  })
})

describe('injectSuperuserRule', () => {
  it('should put the owner rule before the first rule', () => {
    const text = injectSuperuserRule(HBA, 'postgres')
    const lines = text.split('\n')

    assertEqual(lines[0], '# TYPE  DATABASE        USER            ADDRESS                 METHOD', 'Header stays first')
    assert(
      text.indexOf(SUPERUSER_RULE) < text.indexOf('local   all             all'),
      'Owner rule comes before the existing rules',
    )
    assert(text.includes('# DO NOT DISABLE!'), 'Explanation block is added')
    assert(text.endsWith('scram-sha-256\n'), 'Existing rules follow unchanged')
  })
})

describe('rewriteTrustRules', () => {
  it('should replace trust by the local and host methods', () => {
    const text = 'local all all trust\nhost all all 127.0.0.1/32 trust\n# trust me\n'

    assertEqual(
      rewriteTrustRules(text, 'peer', 'md5'),
      'local all all peer\nhost all all 127.0.0.1/32 md5\n# trust me\n',
      'Only trust rules change',
    )
  })
})

describe('restrictedHbaRules', () => {
  it('should admit only the owner over the socket', () => {
    assertEqual(restrictedHbaRules('postgres'), 'local all postgres ident\n', 'Restricted rules')
  })
})

describe('readHbaFile', () => {
  it('should return null for a missing file', async () => {
    assertNullish(await readHbaFile(join(tmpdir(), 'pgc-no-such-dir', 'pg_hba.conf')), 'Missing file')
  })
})
