export const DEFAULT_DISCOVERY_TIMEOUT = 1000
export const DEFAULT_REQUEST_TIMEOUT = 5000
export const DEFAULT_REUSE_INCOMING_PORT = true
export const DEFAULT_LEASE_DURATION = 0
export const NS_SOAP = 'http://schemas.xmlsoap.org/soap/envelope/'
export const NS_SOAP_ENCODING = 'http://schemas.xmlsoap.org/soap/encoding/'

export const SSDP_MULTICAST_ADDRESS = '239.255.255.250'
export const SSDP_PORT = 1900

/**
 * Routers are asked to keep multicast search packets on the local segment
 */
export const SSDP_MULTICAST_TTL = 2

/**
 * @see https://upnp.org/specs/gw/UPnP-gw-InternetGatewayDevice-v1-Device.pdf
 */
export const DEVICE_INTERNET_GATEWAY_DEVICE_1 = 'urn:schemas-upnp-org:device:InternetGatewayDevice:1'

/**
 * @see https://upnp.org/specs/gw/UPnP-gw-WANIPConnection-v1-Service.pdf
 */
export const SERVICE_WAN_IP_CONNECTION = 'urn:schemas-upnp-org:service:WANIPConnection:'

/**
 * @see https://upnp.org/specs/gw/UPnP-gw-WANPPPConnection-v1-Service.pdf
 */
export const SERVICE_WAN_PPP_CONNECTION = 'urn:schemas-upnp-org:service:WANPPPConnection:'

/**
 * @see https://upnp.org/specs/gw/UPnP-gw-WANCommonInterfaceConfig-v1-Service.pdf
 */
export const SERVICE_WAN_COMMON_INTERFACE_CONFIG = 'urn:schemas-upnp-org:service:WANCommonInterfaceConfig:'
