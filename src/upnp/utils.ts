/**
 * An element as produced by xml2js with `explicitArray: false` and
 * `attrkey: '@'` - attributes under `@`, text under `_` when the element
 * also has attributes
 */
export type XMLNode = Record<string, unknown>

export function isNode (value: unknown): value is XMLNode {
  return value != null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Returns the element name without any namespace prefix, e.g. `s:Body` ->
 * `Body`
 */
export function localName (key: string): string {
  const index = key.indexOf(':')

  return index === -1 ? key : key.substring(index + 1)
}

/**
 * Finds a child element by local name so that gateways using different
 * namespace prefixes (`s:`, `SOAP-ENV:`, `u:`, `m:`, none) all match
 */
export function findChild (node: unknown, name: string): unknown {
  if (!isNode(node)) {
    return undefined
  }

  const key = Object.keys(node).find(k => k !== '@' && localName(k) === name)

  if (key == null) {
    return undefined
  }

  const child = node[key]

  return Array.isArray(child) ? child[0] : child
}

/**
 * Returns every child element with the passed local name
 */
export function findChildren (node: unknown, name: string): unknown[] {
  if (!isNode(node)) {
    return []
  }

  const key = Object.keys(node).find(k => k !== '@' && localName(k) === name)

  return key == null ? [] : toArray(node[key])
}

/**
 * Returns the text content of a leaf element
 */
export function textOf (value: unknown): string {
  if (typeof value === 'string') {
    return value.trim()
  }

  if (isNode(value) && typeof value._ === 'string') {
    return value._.trim()
  }

  return ''
}

/**
 * Returns the leaf children of an element as name/text pairs, prefixes
 * stripped
 */
export function childValues (node: unknown): Record<string, string> {
  const output: Record<string, string> = {}

  if (!isNode(node)) {
    return output
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === '@' || key === '_') {
      continue
    }

    output[localName(key)] = textOf(Array.isArray(value) ? value[0] : value)
  }

  return output
}

export function toArray <T> (item: T | T[] | undefined): T[] {
  if (item == null) {
    return []
  }

  return Array.isArray(item) ? item : [item]
}

export function escapeXML (value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

export function stripHostBrackets (host: string): string {
  if (host.startsWith('[')) {
    host = host.substring(1)
  }

  if (host.endsWith(']')) {
    host = host.substring(0, host.length - 1)
  }

  return host
}
