import { logger } from '@libp2p/logger'
import { raceSignal } from 'race-signal'
import { StatisticUnavailableError, NotDiscoveredError } from '../errors.js'
import { checkPort, checkProtocol, checkTimeout } from '../utils.js'
import { DEFAULT_DISCOVERY_TIMEOUT, DEFAULT_LEASE_DURATION, DEFAULT_REQUEST_TIMEOUT } from './constants.js'
import { fetchAndValidate } from './device.js'
import { discoverDevices } from './discovery.js'
import { formatPortMapping } from './port-mapping.js'
import { connectionTarget, interfaceTarget, invoke } from './soap.js'
import { stripHostBrackets } from './utils.js'
import type { AddPortMappingOptions, ConnectionStatus, ControlPoint, ControlPointOptions, DiscoverOptions, LinkBitrates, PortMapping, Protocol } from '../index.js'
import type { ControlSession } from './device.js'
import type { ActionArguments, ServiceTarget } from './soap.js'
import type { AbortOptions } from 'abort-error'

const log = logger('upnp-igd:control-point')

function parseStatistic (value: string | undefined, name: string): number {
  const trimmed = value?.trim() ?? ''
  const statistic = Number(trimmed)

  if (trimmed === '' || !Number.isSafeInteger(statistic) || statistic < 0) {
    throw new StatisticUnavailableError(`${name} was not available, the gateway returned "${value ?? ''}"`)
  }

  return statistic
}

function parseInteger (value: string | undefined): number {
  const number = Number.parseInt(value ?? '', 10)

  return Number.isNaN(number) ? 0 : number
}

/**
 * Holds the session of one Internet Gateway Device. Unbound until a
 * discovery succeeds, after which every operation is a SOAP call against the
 * session's control URLs.
 */
export class UPnPControlPoint implements ControlPoint {
  private readonly options: ControlPointOptions
  private session?: ControlSession
  private discovery?: Promise<ControlSession>
  private discoveryController?: AbortController

  constructor (options: ControlPointOptions = {}) {
    checkTimeout(options.discoveryTimeout ?? DEFAULT_DISCOVERY_TIMEOUT, 'Discovery timeout')
    checkTimeout(options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT, 'Request timeout')

    this.options = options

    if (options.autoDiscover === true) {
      this.discover()
        .catch(err => {
          log.error('background discovery failed - %e', err)
        })
    }
  }

  async discover (options: DiscoverOptions = {}): Promise<ControlSession> {
    if (this.discovery != null) {
      log('joining in-flight discovery')
      return raceSignal(this.discovery, options.signal)
    }

    const timeout = options.timeout ?? this.options.discoveryTimeout ?? DEFAULT_DISCOVERY_TIMEOUT
    checkTimeout(timeout, 'Discovery timeout')

    const controller = new AbortController()
    const signal = options.signal == null ? controller.signal : AbortSignal.any([options.signal, controller.signal])

    this.discoveryController = controller
    this.discovery = this.runDiscovery(timeout, options.locations, signal)
      .finally(() => {
        this.discovery = undefined
        this.discoveryController = undefined
      })

    return this.discovery
  }

  private async runDiscovery (timeout: number, locations: URL[] | undefined, signal: AbortSignal): Promise<ControlSession> {
    // a failed re-discovery leaves the control point unbound
    this.session = undefined

    if (locations == null) {
      log('searching for gateways for %dms', timeout)

      const devices = await discoverDevices({
        timeout,
        signal,
        searchTarget: this.options.searchTarget,
        sourceAddress: this.options.sourceAddress,
        reuseIncomingPort: this.options.reuseIncomingPort,
        enoughResponses: this.options.enoughResponses,
        searchPort: this.options.searchPort
      })

      locations = devices.map(device => device.location)
    }

    const session = await fetchAndValidate(locations, {
      signal,
      timeout: this.options.requestTimeout
    })

    signal.throwIfAborted()
    this.session = session

    return session
  }

  /**
   * Waits for any in-flight discovery, then returns the current session
   */
  private async getSession (): Promise<ControlSession> {
    if (this.discovery != null) {
      return this.discovery
    }

    if (this.session == null) {
      throw new NotDiscoveredError()
    }

    return this.session
  }

  private async run (service: (session: ControlSession) => ServiceTarget, action: string, args: ActionArguments, options?: AbortOptions): Promise<Record<string, string>> {
    const session = await this.getSession()

    return invoke(service(session), action, args, {
      timeout: this.options.requestTimeout,
      signal: options?.signal
    })
  }

  async lanIP (): Promise<string> {
    const session = await this.getSession()

    return session.lanIP
  }

  async routerIP (): Promise<string> {
    const session = await this.getSession()

    return stripHostBrackets(new URL(session.urlBase).hostname)
  }

  async externalIP (options?: AbortOptions): Promise<string> {
    log.trace('discover external IP address')

    const response = await this.run(connectionTarget, 'GetExternalIPAddress', [], options)
    const ip = response.NewExternalIPAddress?.trim() ?? ''

    log.trace('discovered external IP address %s', ip)

    return ip
  }

  async status (options?: AbortOptions): Promise<ConnectionStatus> {
    const response = await this.run(connectionTarget, 'GetStatusInfo', [], options)

    return {
      connectionStatus: response.NewConnectionStatus ?? '',
      lastConnectionError: response.NewLastConnectionError ?? '',
      uptime: parseInteger(response.NewUptime)
    }
  }

  async connectionType (options?: AbortOptions): Promise<string> {
    const response = await this.run(connectionTarget, 'GetConnectionTypeInfo', [], options)

    return response.NewConnectionType ?? ''
  }

  async totalBytesSent (options?: AbortOptions): Promise<number> {
    const response = await this.run(interfaceTarget, 'GetTotalBytesSent', [], options)

    return parseStatistic(response.NewTotalBytesSent, 'Total bytes sent')
  }

  async totalBytesReceived (options?: AbortOptions): Promise<number> {
    const response = await this.run(interfaceTarget, 'GetTotalBytesReceived', [], options)

    return parseStatistic(response.NewTotalBytesReceived, 'Total bytes received')
  }

  async totalPacketsSent (options?: AbortOptions): Promise<number> {
    const response = await this.run(interfaceTarget, 'GetTotalPacketsSent', [], options)

    return parseStatistic(response.NewTotalPacketsSent, 'Total packets sent')
  }

  async totalPacketsReceived (options?: AbortOptions): Promise<number> {
    const response = await this.run(interfaceTarget, 'GetTotalPacketsReceived', [], options)

    return parseStatistic(response.NewTotalPacketsReceived, 'Total packets received')
  }

  async maxLinkBitrates (options?: AbortOptions): Promise<LinkBitrates> {
    const response = await this.run(interfaceTarget, 'GetLinkLayerMaxBitRates', [], options)

    return {
      downstream: parseStatistic(response.NewDownstreamMaxBitRate, 'Downstream max bitrate'),
      upstream: parseStatistic(response.NewUpstreamMaxBitRate, 'Upstream max bitrate')
    }
  }

  async listPortMappings (options?: AbortOptions): Promise<PortMapping[]> {
    const session = await this.getSession()
    const mappings: PortMapping[] = []

    // the gateway reports the end of the table and a real failure the same
    // way, so any error other than the caller's abort ends the list
    for (let index = 0; ; index++) {
      let response: Record<string, string>

      try {
        response = await invoke(connectionTarget(session), 'GetGenericPortMappingEntry', [
          ['NewPortMappingIndex', index]
        ], {
          timeout: this.options.requestTimeout,
          signal: options?.signal
        })
      } catch (err) {
        if (options?.signal?.aborted === true) {
          throw err
        }

        log.trace('port mapping list ended at index %d - %e', index, err)
        break
      }

      const protocol = response.NewProtocol?.trim()

      if (protocol !== 'TCP' && protocol !== 'UDP') {
        log('skipping port mapping %d with unknown protocol "%s"', index, response.NewProtocol)
        continue
      }

      const mapping: PortMapping = {
        externalPort: parseInteger(response.NewExternalPort),
        internalPort: parseInteger(response.NewInternalPort),
        protocol,
        internalClient: response.NewInternalClient ?? '',
        description: response.NewPortMappingDescription ?? '',
        enabled: response.NewEnabled === '1',
        remoteHost: response.NewRemoteHost ?? '',
        leaseDuration: parseInteger(response.NewLeaseDuration)
      }

      log.trace('port mapping %d: %s', index, formatPortMapping(mapping))
      mappings.push(mapping)
    }

    return mappings
  }

  async getPortMapping (externalPort: number, protocol: Protocol, options?: AbortOptions): Promise<PortMapping> {
    checkPort(externalPort, 'External port')
    checkProtocol(protocol)

    const response = await this.run(connectionTarget, 'GetSpecificPortMappingEntry', [
      ['NewRemoteHost', ''],
      ['NewExternalPort', externalPort],
      ['NewProtocol', protocol]
    ], options)

    return {
      externalPort,
      internalPort: parseInteger(response.NewInternalPort),
      protocol,
      internalClient: response.NewInternalClient ?? '',
      description: response.NewPortMappingDescription ?? '',
      enabled: response.NewEnabled === '1',
      remoteHost: '',
      leaseDuration: parseInteger(response.NewLeaseDuration)
    }
  }

  async addPortMapping (externalPort: number, internalPort: number, protocol: Protocol, description: string, internalClient?: string, options: AddPortMappingOptions = {}): Promise<void> {
    checkPort(externalPort, 'External port')
    checkPort(internalPort, 'Internal port')
    checkProtocol(protocol)

    const leaseDuration = options.leaseDuration ?? DEFAULT_LEASE_DURATION

    if (leaseDuration !== 0) {
      checkTimeout(leaseDuration, 'Lease duration')
    }

    const session = await this.getSession()
    const client = internalClient ?? session.lanIP

    log('mapping external port %d/%s to %s:%d', externalPort, protocol, client, internalPort)

    await invoke(connectionTarget(session), 'AddPortMapping', [
      ['NewRemoteHost', options.remoteHost ?? ''],
      ['NewExternalPort', externalPort],
      ['NewProtocol', protocol],
      ['NewInternalPort', internalPort],
      ['NewInternalClient', client],
      ['NewEnabled', 1],
      ['NewPortMappingDescription', description],
      ['NewLeaseDuration', leaseDuration]
    ], {
      timeout: this.options.requestTimeout,
      signal: options.signal
    })
  }

  async deletePortMapping (externalPort: number, protocol: Protocol, options?: AbortOptions): Promise<void> {
    checkPort(externalPort, 'External port')
    checkProtocol(protocol)

    log('unmapping external port %d/%s', externalPort, protocol)

    await this.run(connectionTarget, 'DeletePortMapping', [
      ['NewRemoteHost', ''],
      ['NewExternalPort', externalPort],
      ['NewProtocol', protocol]
    ], options)
  }

  async stop (): Promise<void> {
    const discovery = this.discovery

    this.discoveryController?.abort()
    this.session = undefined

    if (discovery != null) {
      try {
        await discovery
      } catch (err) {
        log.trace('discovery ended on stop - %e', err)
      }
    }
  }
}
