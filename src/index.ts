/**
 * @packageDocumentation
 *
 * Find a [UPnP](https://en.wikipedia.org/wiki/Universal_Plug_and_Play)
 * Internet Gateway Device on the local network, read its external IP address,
 * connection status and link statistics, and add, list or remove port
 * mappings.
 *
 * @example Router information
 *
 * ```TypeScript
 * import { upnpClient } from 'upnp-igd'
 *
 * const client = upnpClient()
 * await client.discover()
 *
 * console.info('Internet IP', await client.externalIP())
 * console.info('Router LAN IP', await client.routerIP())
 *
 * const { downstream, upstream } = await client.maxLinkBitrates()
 * console.info(`Max link bitrate ${downstream}/${upstream}`)
 *
 * const { connectionStatus, uptime } = await client.status()
 * console.info('Status', connectionStatus, 'uptime', uptime)
 *
 * await client.stop()
 * ```
 *
 * @example Port mappings
 *
 * ```TypeScript
 * import { upnpClient, formatPortMapping } from 'upnp-igd'
 *
 * const client = upnpClient({ autoDiscover: true })
 *
 * // waits for the background discovery to finish
 * await client.addPortMapping(8080, 80, 'TCP', 'my web server')
 *
 * for (const mapping of await client.listPortMappings()) {
 *   console.info(formatPortMapping(mapping))
 * }
 *
 * await client.deletePortMapping(8080, 'TCP')
 * ```
 *
 * ## Errors
 *
 * Every failure is one of the classes exported from this module - check
 * `err.name` to decide whether to fix the arguments (`InvalidArgumentError`),
 * discover again (`NotDiscoveredError`, `NoDeviceFoundError`,
 * `NoValidIGDError`, `TransportError`) or report the gateway's answer
 * (`SoapFaultError`, `StatisticUnavailableError`). Nothing is retried
 * automatically.
 *
 * ## Additional Information
 *
 * - <https://upnp.org/specs/gw/UPnP-gw-InternetGatewayDevice-v1-Device.pdf>
 * - <https://upnp.org/specs/gw/UPnP-gw-WANIPConnection-v1-Service.pdf>
 * - <https://upnp.org/specs/gw/UPnP-gw-WANCommonInterfaceConfig-v1-Service.pdf>
 */

import { UPnPControlPoint } from './upnp/control-point.js'
import type { ControlSession } from './upnp/device.js'
import type { AbortOptions } from 'abort-error'

export { InvalidArgumentError, NotDiscoveredError, NoDeviceFoundError, NoValidIGDError, TransportError, SoapFaultError, StatisticUnavailableError } from './errors.js'
export { describe as describeError } from './upnp/error-catalog.js'
export { formatPortMapping } from './upnp/port-mapping.js'
export type { ControlSession } from './upnp/device.js'
export type { GatewayDevice } from './upnp/discovery.js'

export type Protocol = 'TCP' | 'UDP'

export interface PortMapping {
  /**
   * The port remote hosts connect to
   */
  externalPort: number

  /**
   * The port on the internal client that receives the traffic
   */
  internalPort: number

  /**
   * The protocol that is mapped
   */
  protocol: Protocol

  /**
   * The LAN address that receives the traffic
   */
  internalClient: string

  /**
   * The description passed when the mapping was added
   */
  description: string

  /**
   * Whether the gateway is currently forwarding traffic for this mapping
   */
  enabled: boolean

  /**
   * Only traffic from this host is forwarded, an empty string means any host
   */
  remoteHost: string

  /**
   * Lease duration in seconds, 0 means the mapping does not expire
   */
  leaseDuration: number
}

export interface ConnectionStatus {
  /**
   * e.g. `Connected`, `Disconnected`, `Connecting`
   */
  connectionStatus: string

  /**
   * e.g. `ERROR_NONE`
   */
  lastConnectionError: string

  /**
   * Seconds the WAN connection has been up
   */
  uptime: number
}

export interface LinkBitrates {
  /**
   * Maximum downstream bitrate in bits/s
   */
  downstream: number

  /**
   * Maximum upstream bitrate in bits/s
   */
  upstream: number
}

export interface AddPortMappingOptions extends AbortOptions {
  /**
   * If specified, only packets from this host will be forwarded. An empty
   * string specifies any host.
   *
   * @default ''
   */
  remoteHost?: string

  /**
   * Lease duration in seconds, 0 requests a permanent mapping
   *
   * @default 0
   */
  leaseDuration?: number
}

export interface DiscoverOptions extends AbortOptions {
  /**
   * How long to collect SSDP responses for in ms, overrides
   * `discoveryTimeout`
   */
  timeout?: number

  /**
   * Device description URLs to validate instead of searching the network,
   * e.g. `http://192.168.1.1:5000/rootDesc.xml`
   */
  locations?: URL[]
}

export interface ControlPointOptions {
  /**
   * Start discovering as soon as the control point is created. Operations
   * called meanwhile wait for the discovery to finish.
   *
   * @default false
   */
  autoDiscover?: boolean

  /**
   * Send the SSDP search from the SSDP port so replies come back to the port
   * they are addressed from. Try `false` if binding port 1900 fails.
   *
   * @default true
   */
  reuseIncomingPort?: boolean

  /**
   * How long to wait for SSDP responses in ms
   *
   * @default 1000
   */
  discoveryTimeout?: number

  /**
   * The SSDP search target
   *
   * @default 'urn:schemas-upnp-org:device:InternetGatewayDevice:1'
   */
  searchTarget?: string

  /**
   * IPv4 address of the local interface to search from
   */
  sourceAddress?: string

  /**
   * Stop waiting for SSDP responses once this many devices have answered
   */
  enoughResponses?: number

  /**
   * How long to wait for each HTTP request to the gateway in ms
   *
   * @default 5000
   */
  requestTimeout?: number

  /**
   * The port SSDP searches are multicast to
   *
   * @default 1900
   */
  searchPort?: number
}

export interface ControlPoint {
  /**
   * Search the network for an Internet Gateway Device and bind to the first
   * one that has a WAN connection service and a WAN common interface config
   * service. Calling this while bound replaces the session, calling it while
   * a discovery is running joins that discovery. A joining call only waits
   * for the running discovery, its `timeout` and `locations` are ignored and
   * aborting its `signal` rejects that call without cancelling the
   * discovery.
   */
  discover(options?: DiscoverOptions): Promise<ControlSession>

  /**
   * The external IP address of the gateway
   */
  externalIP(options?: AbortOptions): Promise<string>

  /**
   * The gateway's LAN address, taken from its description URL
   */
  routerIP(): Promise<string>

  /**
   * This host's address on the gateway's LAN
   */
  lanIP(): Promise<string>

  status(options?: AbortOptions): Promise<ConnectionStatus>

  /**
   * e.g. `IP_Routed` or `PPPoE`
   */
  connectionType(options?: AbortOptions): Promise<string>

  totalBytesSent(options?: AbortOptions): Promise<number>
  totalBytesReceived(options?: AbortOptions): Promise<number>
  totalPacketsSent(options?: AbortOptions): Promise<number>
  totalPacketsReceived(options?: AbortOptions): Promise<number>

  maxLinkBitrates(options?: AbortOptions): Promise<LinkBitrates>

  /**
   * Reads the gateway's port mapping table entry by entry. The gateway
   * signals the end of the table with an error, so any error ends the list
   * rather than being thrown.
   */
  listPortMappings(options?: AbortOptions): Promise<PortMapping[]>

  getPortMapping(externalPort: number, protocol: Protocol, options?: AbortOptions): Promise<PortMapping>

  /**
   * Forward `externalPort` on the gateway to `internalPort` on
   * `internalClient`, which defaults to this host's LAN address. Whether an
   * existing mapping is replaced is up to the gateway.
   */
  addPortMapping(externalPort: number, internalPort: number, protocol: Protocol, description: string, internalClient?: string, options?: AddPortMappingOptions): Promise<void>

  deletePortMapping(externalPort: number, protocol: Protocol, options?: AbortOptions): Promise<void>

  /**
   * Cancel any running discovery and forget the gateway
   */
  stop(): Promise<void>
}

/**
 * Create a UPnP Internet Gateway Device control point
 */
export function upnpClient (options: ControlPointOptions = {}): ControlPoint {
  return new UPnPControlPoint(options)
}
