import { networkInterfaces } from 'node:os'
import ssdp from '@achingbrain/ssdp'
import { isIPv4 } from '@chainsafe/is-ip'
import { logger } from '@libp2p/logger'
import { AbortError } from 'abort-error'
import { InvalidArgumentError, NoDeviceFoundError, TransportError } from '../errors.js'
import { checkPort, checkTimeout } from '../utils.js'
import { DEFAULT_DISCOVERY_TIMEOUT, DEFAULT_REUSE_INCOMING_PORT, DEVICE_INTERNET_GATEWAY_DEVICE_1, SSDP_MULTICAST_ADDRESS, SSDP_MULTICAST_TTL, SSDP_PORT } from './constants.js'
import type { SSDP, SSDPSocketOptions } from '@achingbrain/ssdp'
import type { AbortOptions } from 'abort-error'

const log = logger('upnp-igd:discovery')

/**
 * A device that answered an SSDP search
 */
export interface GatewayDevice {
  /**
   * Where the device description can be fetched from
   */
  location: URL

  /**
   * The `ST` header of the response
   */
  serviceType: string

  /**
   * The `USN` header of the response
   */
  uniqueServiceName: string
}

export interface SearchOptions extends AbortOptions {
  /**
   * How long to collect responses for in ms
   *
   * @default 1000
   */
  timeout?: number

  /**
   * The `ST` header to search with, pass `ssdp:all` for routers that do not
   * answer the device type
   *
   * @default 'urn:schemas-upnp-org:device:InternetGatewayDevice:1'
   */
  searchTarget?: string

  /**
   * The IPv4 address of the local interface to search from, every external
   * IPv4 interface is used if omitted
   */
  sourceAddress?: string

  /**
   * If true the search is sent from the SSDP port so that replies arrive on
   * the same port, some firewalls only let those through. If false an
   * ephemeral port is used.
   *
   * @default true
   */
  reuseIncomingPort?: boolean

  /**
   * Stop collecting once this many devices have answered instead of waiting
   * for the whole timeout
   */
  enoughResponses?: number

  /**
   * The port the search is multicast to
   *
   * @default 1900
   */
  searchPort?: number
}

/**
 * IPv4 addresses of this host, optionally including loopback
 */
function interfaceAddresses (includeInternal: boolean): string[] {
  const addresses: string[] = []

  for (const interfaces of Object.values(networkInterfaces())) {
    interfaces?.forEach(iface => {
      if (iface.family !== 'IPv4' || (iface.internal && !includeInternal)) {
        return
      }

      // skip link-local addresses
      if (iface.address.startsWith('169.254.')) {
        return
      }

      addresses.push(iface.address)
    })
  }

  return addresses
}

function getSockets (sourceAddress: string | undefined, port: number, searchPort: number): SSDPSocketOptions[] {
  const addresses = sourceAddress != null ? [sourceAddress] : interfaceAddresses(false)

  if (addresses.length === 0) {
    // no external interface, let the OS pick one
    addresses.push('0.0.0.0')
  }

  return addresses.map((address): SSDPSocketOptions => ({
    type: 'udp4',
    bind: {
      address,
      port
    },
    broadcast: {
      address: SSDP_MULTICAST_ADDRESS,
      port: searchPort
    },
    maxHops: SSDP_MULTICAST_TTL
  }))
}

/**
 * Multicasts an `M-SEARCH` and collects every distinct device that answers
 * within the timeout
 */
export async function discoverDevices (options: SearchOptions = {}): Promise<GatewayDevice[]> {
  const timeout = options.timeout ?? DEFAULT_DISCOVERY_TIMEOUT
  const searchTarget = options.searchTarget ?? DEVICE_INTERNET_GATEWAY_DEVICE_1
  const reuseIncomingPort = options.reuseIncomingPort ?? DEFAULT_REUSE_INCOMING_PORT
  const searchPort = options.searchPort ?? SSDP_PORT

  checkTimeout(timeout, 'Discovery timeout')
  checkPort(searchPort, 'Search port')

  if (options.sourceAddress != null && (!isIPv4(options.sourceAddress) || !interfaceAddresses(true).includes(options.sourceAddress))) {
    throw new InvalidArgumentError(`Source address must be an IPv4 address of this host, got "${options.sourceAddress}"`)
  }

  if (options.enoughResponses != null) {
    checkTimeout(options.enoughResponses, 'Response count')
  }

  options.signal?.throwIfAborted()

  const window = AbortSignal.timeout(timeout)
  const signal = options.signal == null ? window : AbortSignal.any([options.signal, window])
  const devices = new Map<string, GatewayDevice>()
  let discovery: SSDP | undefined

  try {
    try {
      discovery = await ssdp({
        cache: false,
        sockets: getSockets(options.sourceAddress, reuseIncomingPort ? SSDP_PORT : 0, searchPort)
      })
    } catch (err) {
      throw new TransportError('Could not open SSDP sockets', { cause: err })
    }

    discovery.on('transport:outgoing-message', (socket, message, remote) => {
      log.trace('-> Outgoing to %s:%s via %s', remote.address, remote.port, socket.type)
      log.trace('%s', message)
    })
    discovery.on('transport:incoming-message', (message, remote) => {
      log.trace('<- Incoming from %s:%s', remote.address, remote.port)
      log.trace('%s', message)
    })
    discovery.on('error', (err) => {
      log.error('SSDP error - %e', err)
    })

    options.signal?.throwIfAborted()

    log('searching for %s for %dms', searchTarget, timeout)

    for await (const service of discovery.discover({
      serviceType: searchTarget,
      signal
    })) {
      const location = service.location.toString()

      if (service.location.protocol !== 'http:' || devices.has(location)) {
        continue
      }

      log('discovered %s at %s', service.serviceType, location)
      devices.set(location, {
        location: service.location,
        serviceType: service.serviceType,
        uniqueServiceName: service.uniqueServiceName
      })

      if (options.enoughResponses != null && devices.size >= options.enoughResponses) {
        break
      }
    }
  } catch (err) {
    if (options.signal?.aborted === true) {
      throw new AbortError()
    }

    // the search window closing ends the search, anything else is a failure
    if (!window.aborted) {
      throw err instanceof TransportError ? err : new TransportError('SSDP search failed', { cause: err })
    }
  } finally {
    await discovery?.stop()
  }

  if (options.signal?.aborted === true) {
    throw new AbortError()
  }

  if (devices.size === 0) {
    throw new NoDeviceFoundError()
  }

  return [...devices.values()]
}
