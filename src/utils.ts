import { createSocket } from 'node:dgram'
import { InvalidArgumentError } from './errors.js'
import type { Protocol } from './index.js'

export function checkPort (port: number, name = 'Port'): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`${name} must be an integer between 1 and 65535, got ${port}`)
  }
}

export function checkProtocol (protocol: string): asserts protocol is Protocol {
  if (protocol !== 'TCP' && protocol !== 'UDP') {
    throw new InvalidArgumentError(`Unknown protocol "${protocol}", only "TCP" and "UDP" are valid`)
  }
}

export function checkTimeout (timeout: number, name = 'Timeout'): void {
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError(`${name} must be an integer greater than 0, got ${timeout}`)
  }
}

/**
 * Returns the local address the operating system would use to reach the
 * passed host. Connecting a UDP socket only selects a route, nothing is sent.
 */
export async function findLanAddress (host: string, port: number): Promise<string> {
  const socket = createSocket('udp4')

  try {
    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject)
      socket.connect(port, host, () => {
        socket.off('error', reject)
        resolve()
      })
    })

    return socket.address().address
  } finally {
    socket.close()
  }
}
