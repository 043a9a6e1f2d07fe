import type { PortMapping } from '../index.js'

/**
 * Renders a mapping as `8080->192.168.1.10:80 TCP for 0 -- description`
 */
export function formatPortMapping (mapping: PortMapping): string {
  return `${mapping.externalPort}->${mapping.internalClient}:${mapping.internalPort} ${mapping.protocol} for ${mapping.leaseDuration} -- ${mapping.description}`
}
