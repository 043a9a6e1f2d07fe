import { logger } from '@libp2p/logger'
import { AbortError } from 'abort-error'
import first from 'it-first'
import { NoValidIGDError } from '../errors.js'
import { findLanAddress } from '../utils.js'
import { SERVICE_WAN_COMMON_INTERFACE_CONFIG, SERVICE_WAN_IP_CONNECTION, SERVICE_WAN_PPP_CONNECTION } from './constants.js'
import { fetchXML } from './fetch.js'
import { findChild, findChildren, textOf, stripHostBrackets } from './utils.js'
import type { XMLNode } from './utils.js'
import type { AbortOptions } from 'abort-error'

const log = logger('upnp-igd:device')

/**
 * Everything needed to control a validated Internet Gateway Device
 */
export interface ControlSession {
  /**
   * Where the device description was fetched from
   */
  readonly location: string

  /**
   * `URLBase` from the description, or the origin of `location`
   */
  readonly urlBase: string

  /**
   * Control URL of the WANIPConnection or WANPPPConnection service
   */
  readonly controlURL: string
  readonly serviceType: string

  /**
   * Control URL of the WANCommonInterfaceConfig service
   */
  readonly controlURLCIF: string
  readonly serviceTypeCIF: string

  /**
   * The address of this host on the gateway's LAN
   */
  readonly lanIP: string
}

export interface GatewayService {
  serviceType: string
  controlURL: string
}

export interface DeviceDescription {
  urlBase?: string
  services: GatewayService[]
}

export interface FetchDescriptionOptions extends AbortOptions {
  /**
   * How long to wait for each description in ms
   *
   * @default 5000
   */
  timeout?: number
}

/**
 * Flattens the services of the root device and all of its embedded devices,
 * in document order
 */
export function parseDescription (root: XMLNode): DeviceDescription {
  const services: GatewayService[] = []

  function traverseServices (service: unknown): void {
    const serviceType = textOf(findChild(service, 'serviceType'))
    const controlURL = textOf(findChild(service, 'controlURL'))

    if (serviceType === '' || controlURL === '') {
      return
    }

    services.push({ serviceType, controlURL })
  }

  function traverseDevices (device: unknown): void {
    if (device == null) {
      return
    }

    findChildren(findChild(device, 'serviceList'), 'service').forEach(traverseServices)
    findChildren(findChild(device, 'deviceList'), 'device').forEach(traverseDevices)
  }

  traverseDevices(findChild(root, 'device'))

  const urlBase = textOf(findChild(root, 'URLBase'))

  return {
    urlBase: urlBase === '' ? undefined : urlBase,
    services
  }
}

/**
 * Returns the URL relative control URLs are resolved against
 */
export function resolveURLBase (location: URL, urlBase?: string): string {
  if (urlBase != null) {
    try {
      return new URL(urlBase).toString()
    } catch (err) {
      log.error('ignoring invalid URLBase %s - %e', urlBase, err)
    }
  }

  return `${location.protocol}//${location.host}/`
}

function findService (services: GatewayService[], prefix: string): GatewayService | undefined {
  return services.find(service => service.serviceType.startsWith(prefix))
}

/**
 * Fetches a device description and turns it into a session, or returns
 * `undefined` if the device lacks the WAN services
 */
export async function createSession (location: URL, options: FetchDescriptionOptions = {}): Promise<ControlSession | undefined> {
  const descriptor = await fetchXML(location, options)
  const description = parseDescription(descriptor)
  const connection = findService(description.services, SERVICE_WAN_IP_CONNECTION) ?? findService(description.services, SERVICE_WAN_PPP_CONNECTION)
  const commonInterface = findService(description.services, SERVICE_WAN_COMMON_INTERFACE_CONFIG)

  if (connection == null || commonInterface == null) {
    log('%s has no WAN connection or common interface config service', location)
    return undefined
  }

  const urlBase = resolveURLBase(location, description.urlBase)
  const host = stripHostBrackets(location.hostname)
  const port = location.port === '' ? (location.protocol === 'https:' ? 443 : 80) : Number(location.port)

  return Object.freeze({
    location: location.toString(),
    urlBase,
    controlURL: new URL(connection.controlURL, urlBase).toString(),
    serviceType: connection.serviceType,
    controlURLCIF: new URL(commonInterface.controlURL, urlBase).toString(),
    serviceTypeCIF: commonInterface.serviceType,
    lanIP: await findLanAddress(host, port)
  })
}

async function * validSessions (locations: URL[], options: FetchDescriptionOptions): AsyncGenerator<ControlSession, void, unknown> {
  for (const location of locations) {
    try {
      const session = await createSession(location, options)

      if (session != null) {
        yield session
      }
    } catch (err) {
      if (options.signal?.aborted === true) {
        throw new AbortError()
      }

      log.error('could not use device at %s - %e', location, err)
    }
  }
}

/**
 * Tries each location in turn and returns a session for the first one that
 * is a usable Internet Gateway Device
 */
export async function fetchAndValidate (locations: URL[], options: FetchDescriptionOptions = {}): Promise<ControlSession> {
  const session = await first(validSessions(locations, options))

  if (session == null) {
    throw new NoValidIGDError()
  }

  log('using gateway %s with %s', session.location, session.serviceType)

  return session
}
