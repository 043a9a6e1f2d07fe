import { logger } from '@libp2p/logger'
import { TransportError } from '../errors.js'
import { NS_SOAP, NS_SOAP_ENCODING } from './constants.js'
import { fetchXML } from './fetch.js'
import { childValues, escapeXML, findChild } from './utils.js'
import type { ControlSession } from './device.js'
import type { AbortOptions } from 'abort-error'

const log = logger('upnp-igd:soap')

export type ActionArguments = Array<[string, string | number]>

export interface ServiceTarget {
  controlURL: string
  serviceType: string
}

export interface InvokeOptions extends AbortOptions {
  /**
   * How long to wait for the gateway to answer in ms
   *
   * @default 5000
   */
  timeout?: number
}

/**
 * The WANIPConnection or WANPPPConnection service of a session
 */
export function connectionTarget (session: ControlSession): ServiceTarget {
  return {
    controlURL: session.controlURL,
    serviceType: session.serviceType
  }
}

/**
 * The WANCommonInterfaceConfig service of a session
 */
export function interfaceTarget (session: ControlSession): ServiceTarget {
  return {
    controlURL: session.controlURLCIF,
    serviceType: session.serviceTypeCIF
  }
}

export function buildEnvelope (serviceType: string, action: string, args: ActionArguments): string {
  return `<?xml version="1.0"?>
<s:Envelope xmlns:s="${NS_SOAP}" s:encodingStyle="${NS_SOAP_ENCODING}">
  <s:Body>
    <u:${action} xmlns:u="${serviceType}">${args.map(([name, value]) => `
      <${name}>${escapeXML(`${value}`)}</${name}>`).join('')}
    </u:${action}>
  </s:Body>
</s:Envelope>`
}

/**
 * Invokes a SOAP action and returns the out arguments of the
 * `<action>Response` element
 */
export async function invoke (target: ServiceTarget, action: string, args: ActionArguments = [], options: InvokeOptions = {}): Promise<Record<string, string>> {
  const requestBody = buildEnvelope(target.serviceType, action, args)

  log('invoke %s on %s', action, target.controlURL)

  const responseBody = await fetchXML(new URL(target.controlURL), {
    ...options,
    method: 'POST',
    headers: {
      'Content-Type': 'text/xml; charset="utf-8"',
      SOAPAction: JSON.stringify(`${target.serviceType}#${action}`)
    },
    body: requestBody
  })

  const response = findChild(findChild(responseBody, 'Body'), `${action}Response`)

  if (response == null) {
    throw new TransportError(`Response to ${action} had no ${action}Response element`)
  }

  return childValues(response)
}
