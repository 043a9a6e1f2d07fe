import { logger } from '@libp2p/logger'
import { AbortError } from 'abort-error'
import xml2js from 'xml2js'
import { SoapFaultError, TransportError } from '../errors.js'
import { DEFAULT_REQUEST_TIMEOUT } from './constants.js'
import { findChild, isNode, textOf } from './utils.js'
import type { XMLNode } from './utils.js'

const log = logger('upnp-igd:fetch')

export interface RequestInit {
  method?: 'POST' | 'GET'
  headers?: Record<string, string>
  body?: string
  signal?: AbortSignal

  /**
   * How long to wait for the response in ms
   *
   * @default 5000
   */
  timeout?: number
}

export async function parseXML (text: string): Promise<XMLNode> {
  const parser = new xml2js.Parser({
    explicitRoot: false,
    explicitArray: false,
    attrkey: '@'
  })

  const parsed: unknown = await parser.parseStringPromise(text)

  if (!isNode(parsed)) {
    throw new Error('Document has no root element')
  }

  return parsed
}

/**
 * Returns the `UPnPError/errorCode` of a SOAP fault envelope, if the document
 * is one
 */
export function findFaultCode (envelope: XMLNode): number | undefined {
  const fault = findChild(findChild(envelope, 'Body'), 'Fault')

  if (fault == null) {
    return undefined
  }

  const code = Number.parseInt(textOf(findChild(findChild(findChild(fault, 'detail'), 'UPnPError'), 'errorCode')), 10)

  return Number.isNaN(code) ? undefined : code
}

/**
 * Requests and parses an XML document. SOAP faults become `SoapFaultError`s,
 * every other failure to get a usable document is a `TransportError`.
 */
export async function fetchXML (url: URL, init: RequestInit = {}): Promise<XMLNode> {
  const timeout = AbortSignal.timeout(init.timeout ?? DEFAULT_REQUEST_TIMEOUT)
  const signal = init.signal == null ? timeout : AbortSignal.any([init.signal, timeout])
  const method = init.method ?? 'GET'

  if (init.body != null) {
    log.trace('->', init.body)
  }

  let response: Response
  let responseText: string

  try {
    response = await fetch(url, {
      method,
      headers: init.headers,
      body: init.body,
      signal
    })

    responseText = await response.text()
  } catch (err) {
    if (init.signal?.aborted === true) {
      throw new AbortError()
    }

    if (timeout.aborted) {
      throw new TransportError(`${method} ${url} timed out`, { cause: err })
    }

    throw new TransportError(`${method} ${url} failed`, { cause: err })
  }

  log.trace('-> %s %s %d', method, url, response.status)
  log.trace('<-', responseText)

  const contentType = response.headers.get('content-type')

  if (contentType?.includes('/xml') !== true) {
    throw new TransportError(`Bad content type from ${url}: ${contentType}`)
  }

  let responseBody: XMLNode

  try {
    responseBody = await parseXML(responseText)
  } catch (err) {
    throw new TransportError(`Malformed XML from ${url}`, { cause: err })
  }

  const code = findFaultCode(responseBody)

  if (code != null) {
    throw new SoapFaultError(code)
  }

  if (!response.ok) {
    throw new TransportError(`Request failed: ${response.status} ${response.statusText}`)
  }

  return responseBody
}
