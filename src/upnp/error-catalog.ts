/**
 * Descriptions of the fault codes an Internet Gateway Device returns in the
 * `UPnPError` element of a SOAP fault
 *
 * @see https://upnp.org/specs/gw/UPnP-gw-WANIPConnection-v1-Service.pdf
 */
const ERROR_CODES: Record<number, string> = {
  402: '402 Invalid Args',
  501: '501 Action Failed',
  713: '713 SpecifiedArrayIndexInvalid: The specified array index is out of bounds',
  714: '714 NoSuchEntryInArray: The specified value does not exist in the array',
  715: '715 WildCardNotPermittedInSrcIP: The source IP address cannot be wild-carded',
  716: '716 WildCardNotPermittedInExtPort: The external port cannot be wild-carded',
  718: '718 ConflictInMappingEntry: The port mapping entry specified conflicts with a mapping assigned previously to another client',
  724: '724 SamePortValuesRequired: Internal and External port values must be the same',
  725: '725 OnlyPermanentLeasesSupported: The NAT implementation only supports permanent lease times on port mappings',
  726: '726 RemoteHostOnlySupportsWildcard: RemoteHost must be a wildcard and cannot be a specific IP address or DNS name',
  727: '727 ExternalPortOnlySupportsWildcard: ExternalPort must be a wildcard and cannot be a specific port value'
}

export function describe (code: number): string {
  return ERROR_CODES[code] ?? `Unknown Error: ${code}`
}
