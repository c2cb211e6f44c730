import net from 'net'
import { defaults, type PortRange } from '../config/defaults'
import {
  ErrorCodes,
  PgClusterError,
  logDebug,
  validationError,
} from './error-handler'
import { isFamilyUnavailableError, isPortInUseError } from './fs-error-utils'

export type AddressFamily = 4 | 6

export type ProbeResult = 'free' | 'in-use' | 'unavailable'

/**
 * Bind test for one port on one address family
 */
export interface PortProbe {
  probe(port: number, family: AddressFamily): Promise<ProbeResult>
}

/**
 * Binds the wildcard address of the family and closes right away.
 * libuv sets SO_REUSEADDR on listening TCP sockets, so a port in
 * TIME_WAIT still counts as free, as it does for the server.
 */
export class NetPortProbe implements PortProbe {
  probe(port: number, family: AddressFamily): Promise<ProbeResult> {
    return new Promise((resolve, reject) => {
      const server = net.createServer()

      server.once('error', (err: NodeJS.ErrnoException) => {
        if (isPortInUseError(err) || err.code === 'EACCES') {
          resolve('in-use')
        } else if (isFamilyUnavailableError(err)) {
          resolve('unavailable')
        } else {
          reject(err)
        }
      })

      server.once('listening', () => {
        server.close(() => resolve('free'))
      })

      server.listen({
        port,
        host: family === 4 ? '0.0.0.0' : '::',
        ipv6Only: family === 6,
        exclusive: true,
      })
    })
  }
}

export class PortAllocator {
  constructor(
    private readonly probe: PortProbe,
    private readonly range: PortRange = defaults.portRange,
  ) {}

  /**
   * True when the port binds on every address family the host has.
   * A host without IPv4 and IPv6 cannot run a server at all.
   */
  async isPortAvailable(port: number): Promise<boolean> {
    const v4 = await this.probe.probe(port, 4)
    const v6 = await this.probe.probe(port, 6)

    if (v4 === 'unavailable' && v6 === 'unavailable') {
      throw new PgClusterError(
        ErrorCodes.NO_PROTOCOL_AVAILABLE,
        'could not bind IPv4 or IPv6 sockets; no usable network protocol',
        'internal',
        undefined,
        { port },
        'fatal',
      )
    }

    return v4 !== 'in-use' && v6 !== 'in-use'
  }

  /**
   * Lowest port of the range that no cluster claims and that is bindable
   */
  async nextFreePort(claimed: Iterable<number>): Promise<number> {
    const taken = new Set(claimed)

    for (let port = this.range.start; port <= this.range.end; port++) {
      if (taken.has(port)) continue
      if (await this.isPortAvailable(port)) {
        logDebug(`Allocated port ${port}`, { claimed: taken.size })
        return port
      }
    }

    throw new PgClusterError(
      ErrorCodes.PORT_RANGE_EXHAUSTED,
      `no free port found in range ${this.range.start}-${this.range.end}`,
      'internal',
      undefined,
      { range: this.range },
      'fatal',
    )
  }
}

/**
 * Explicit ports must lie in 1024-65535
 */
export function assertValidExplicitPort(port: number): void {
  const { start, end } = defaults.explicitPortRange
  if (!Number.isInteger(port) || port < start || port > end) {
    throw validationError(
      ErrorCodes.PORT_INVALID,
      `invalid port ${port}: must be between ${start} and ${end}`,
      { port },
    )
  }
}

/**
 * Parse a port given on the command line
 */
export function parsePort(value: string): number {
  const port = /^\d+$/.test(value) ? Number(value) : Number.NaN
  if (Number.isNaN(port)) {
    throw validationError(ErrorCodes.PORT_INVALID, `invalid port "${value}"`, {
      port: value,
    })
  }
  assertValidExplicitPort(port)
  return port
}
