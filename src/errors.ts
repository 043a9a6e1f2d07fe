import { describe } from './upnp/error-catalog.js'

/**
 * A port, protocol or timeout failed local validation. Thrown before any
 * network traffic is sent.
 */
export class InvalidArgumentError extends Error {
  static name = 'InvalidArgumentError'
  name = 'InvalidArgumentError'
}

/**
 * An operation that needs a gateway was called before a successful discovery
 */
export class NotDiscoveredError extends Error {
  static name = 'NotDiscoveredError'
  name = 'NotDiscoveredError'

  constructor (message = 'No gateway has been discovered') {
    super(message)
  }
}

/**
 * The SSDP search window closed without any device answering
 */
export class NoDeviceFoundError extends Error {
  static name = 'NoDeviceFoundError'
  name = 'NoDeviceFoundError'

  constructor (message = 'No UPnP device found') {
    super(message)
  }
}

/**
 * Devices answered but none of them exposed a WAN connection service and a
 * WAN common interface config service
 */
export class NoValidIGDError extends Error {
  static name = 'NoValidIGDError'
  name = 'NoValidIGDError'

  constructor (message = 'No valid Internet Gateway Device found') {
    super(message)
  }
}

/**
 * The gateway could not be reached or sent something that was not a SOAP
 * response
 */
export class TransportError extends Error {
  static name = 'TransportError'
  name = 'TransportError'
}

/**
 * The gateway rejected a SOAP action with a UPnP error code
 */
export class SoapFaultError extends Error {
  static name = 'SoapFaultError'
  name = 'SoapFaultError'
  public readonly code: number

  constructor (code: number) {
    super(describe(code))
    this.code = code
  }
}

/**
 * A link statistic came back negative, empty or not a number
 */
export class StatisticUnavailableError extends Error {
  static name = 'StatisticUnavailableError'
  name = 'StatisticUnavailableError'
}
