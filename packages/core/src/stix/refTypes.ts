// --- Rules ---

/**
 * Maps a reference property to the object types it may point at.
 * A rule matches when every criterion it sets matches.
 */
export interface RefTypeRule {
  /** Exact reference property names */
  props?: readonly string[] | undefined
  /** Matches any property ending with this text */
  suffix?: string | undefined
  /** Matches any property containing this text */
  contains?: string | undefined
  /** Restricts the rule to references held by these object types */
  sourceTypes?: readonly string[] | undefined
  /** Candidate target types, most likely first */
  targets: readonly string[]
}

const IP_TYPES = ['ipv4-addr', 'ipv6-addr'] as const

/** Reference properties of the STIX 2.x cyber-observable objects plus common OCA/IBM extensions. */
export const STIX_REF_RULES: readonly RefTypeRule[] = [
  { props: ['parent_ref'], targets: ['process'] },
  { props: ['dst_ref', 'dst_ip_ref', 'src_ref', 'src_ip_ref'], targets: IP_TYPES },
  { sourceTypes: IP_TYPES, props: ['resolves_to_refs'], targets: ['mac-addr'] },
  { props: ['binary_ref', 'image_ref'], targets: ['file'] },
  { props: ['parent_directory_ref'], targets: ['directory'] },
  { props: ['creator_user_ref'], targets: ['user-account'] },
  { props: ['dst_os_ref', 'src_os_ref', 'dst_application_ref', 'src_application_ref'], targets: ['software'] },
  { props: ['ip_refs'], targets: IP_TYPES },
  { props: ['mac_refs'], targets: ['mac-addr'] },
  { props: ['opened_connection_refs'], targets: ['network-traffic'] },
  { props: ['src_payload_ref', 'dst_payload_ref'], targets: ['artifact'] },
  { sourceTypes: ['x-oca-event'], props: ['original_ref'], targets: ['artifact'] },
  { sourceTypes: ['x-oca-event'], props: ['host_ref'], targets: ['x-oca-asset'] },
  { sourceTypes: ['x-oca-event'], props: ['url_ref'], targets: ['url'] },
  { sourceTypes: ['x-oca-event'], props: ['file_ref'], targets: ['file'] },
  { sourceTypes: ['x-oca-event'], contains: 'process', targets: ['process'] },
  { sourceTypes: ['x-oca-event'], props: ['domain_ref'], targets: ['domain-name'] },
  { sourceTypes: ['x-oca-event'], props: ['registry_ref'], targets: ['windows-registry-key'] },
  { sourceTypes: ['x-oca-event'], props: ['network_ref'], targets: ['network-traffic'] },
  { sourceTypes: ['x-oca-event'], props: ['user_ref'], targets: ['user-account'] },
  { sourceTypes: ['x-ibm-finding'], suffix: '_user_ref', targets: ['user-account'] },
  {
    sourceTypes: ['email-message'],
    props: ['from_ref', 'sender_ref', 'to_refs', 'cc_refs', 'bcc_refs'],
    targets: ['email-addr'],
  },
]

// --- Table ---

/**
 * Ordered reference-type lookup. The first matching rule decides, and its
 * targets keep their declared order, so ambiguous references resolve the same
 * way every time.
 */
export class RefTypeTable {
  readonly rules: readonly RefTypeRule[]

  constructor(rules: readonly RefTypeRule[]) {
    this.rules = rules
  }

  /** Candidate target types of `prop` on `sourceType`; empty when unknown. */
  targets(sourceType: string, prop: string): readonly string[] {
    for (const rule of this.rules) {
      if (ruleMatches(rule, sourceType, prop)) {
        return rule.targets
      }
    }
    return []
  }

  /** A table whose `rules` are consulted before this one's. */
  extend(rules: readonly RefTypeRule[]): RefTypeTable {
    return new RefTypeTable([...rules, ...this.rules])
  }
}

function ruleMatches(rule: RefTypeRule, sourceType: string, prop: string): boolean {
  if (rule.sourceTypes !== undefined && !rule.sourceTypes.includes(sourceType)) return false
  if (rule.props !== undefined && !rule.props.includes(prop)) return false
  if (rule.suffix !== undefined && !prop.endsWith(rule.suffix)) return false
  if (rule.contains !== undefined && !prop.includes(rule.contains)) return false
  return true
}

export const DEFAULT_REF_TYPES = new RefTypeTable(STIX_REF_RULES)
