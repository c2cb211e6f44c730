import { describe, it } from 'node:test'
import { ErrorCodes } from '../../core/error-handler'
import {
  PortAllocator,
  assertValidExplicitPort,
  parsePort,
} from '../../core/port-manager'
import { FakePortProbe } from '../utils/fake-host'
import { assert, assertEqual, assertErrorCode, assertRejects } from '../utils/assertions'

function thrown(fn: () => void): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return null
}

describe('PortAllocator', () => {
  describe('nextFreePort', () => {
    it('should start at 5432 when nothing is claimed', async () => {
      const allocator = new PortAllocator(new FakePortProbe())
      assertEqual(await allocator.nextFreePort([]), 5432, 'First port of the range')
    })

    it('should skip ports claimed by clusters', async () => {
      const allocator = new PortAllocator(new FakePortProbe())
      assertEqual(await allocator.nextFreePort([5432, 5433]), 5434, 'Next unclaimed port')
    })

    it('should skip ports something else is listening on', async () => {
      const probe = new FakePortProbe()
      probe.busy.add(5434)
      const allocator = new PortAllocator(probe)

      assertEqual(await allocator.nextFreePort([5432, 5433]), 5435, 'Busy port skipped')
    })

    it('should fail when the range is exhausted', async () => {
      const probe = new FakePortProbe()
      probe.busy.add(6001)
      const allocator = new PortAllocator(probe, { start: 6000, end: 6001 })

      const error = await assertRejects(allocator.nextFreePort([6000]), 'Range exhausted')
      assertErrorCode(error, ErrorCodes.PORT_RANGE_EXHAUSTED, 'Exhausted range')
    })
  })

  describe('isPortAvailable', () => {
    it('should accept a port when only one address family exists', async () => {
      const probe = new FakePortProbe()
      probe.unavailable.add(6)
      const allocator = new PortAllocator(probe)

      assert(await allocator.isPortAvailable(5432), 'IPv4 alone is enough')
    })

    it('should fail when neither IPv4 nor IPv6 can bind', async () => {
      const probe = new FakePortProbe()
      probe.unavailable.add(4)
      probe.unavailable.add(6)
      const allocator = new PortAllocator(probe)

      const error = await assertRejects(allocator.isPortAvailable(5432), 'No protocol')
      assertErrorCode(error, ErrorCodes.NO_PROTOCOL_AVAILABLE, 'No protocol available')
      assertEqual(error.severity, 'fatal', 'Fatal severity')
    })
  })
})

describe('explicit ports', () => {
  it('should accept ports from 1024 to 65535', () => {
    assertValidExplicitPort(1024)
    assertValidExplicitPort(5433)
    assertValidExplicitPort(65535)
  })

  it('should reject privileged and out-of-range ports', () => {
    for (const port of [80, 1023, 65536, 5432.5]) {
      assertErrorCode(
        thrown(() => assertValidExplicitPort(port)),
        ErrorCodes.PORT_INVALID,
        `Port ${port}`,
      )
    }
  })

  it('should parse command line ports', () => {
    assertEqual(parsePort('5433'), 5433, 'Numeric port')
    assertErrorCode(thrown(() => parsePort('abc')), ErrorCodes.PORT_INVALID, 'Not a number')
    assertErrorCode(thrown(() => parsePort('-5433')), ErrorCodes.PORT_INVALID, 'Negative')
    assertErrorCode(thrown(() => parsePort('80')), ErrorCodes.PORT_INVALID, 'Privileged port')
  })
})
