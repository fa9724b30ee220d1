import ipaddr from 'ipaddr.js';

export type IPAddress = ReturnType<typeof ipaddr.parse>;

/**
 * A parsed lookup target together with its canonical text form
 */
export interface TargetAddress {
    address: IPAddress;
    /** Dotted quad for IPv4, RFC 5952 for IPv6 */
    canonical: string;
}

type CidrBlock = [IPAddress, number];

/**
 * Parses the address being looked up.
 * @returns null when the text is not an IP address
 */
export function parseTarget(ip: string): TargetAddress | null {
    const text = ip.trim();
    if (!ipaddr.IPv4.isValidFourPartDecimal(text) && !ipaddr.IPv6.isValid(text)) {
        return null;
    }
    // IPv4-mapped IPv6 (::ffff:a.b.c.d) is compared as the IPv4 address it carries
    const address = ipaddr.process(text);
    return { address, canonical: address.toString() };
}

function parseCidr(entry: string): CidrBlock | null {
    const [network = ''] = entry.split('/', 1);
    if (!ipaddr.IPv4.isValidFourPartDecimal(network) && !ipaddr.IPv6.isValid(network)) {
        return null;
    }
    try {
        return ipaddr.parseCIDR(entry);
    } catch {
        return null;
    }
}

/**
 * An entry that parses as a CIDR block matches by containment; anything else matches
 * only when it equals the target's canonical text.
 */
export function entryContains(entry: string, target: TargetAddress): boolean {
    const block = parseCidr(entry);
    if (!block) {
        return entry === target.canonical;
    }

    // Blocks of the other address family never match
    const [network, prefixLength] = block;
    const address = target.address;
    if (address instanceof ipaddr.IPv4 && network instanceof ipaddr.IPv4) {
        return address.match(network, prefixLength);
    }
    if (address instanceof ipaddr.IPv6 && network instanceof ipaddr.IPv6) {
        return address.match(network, prefixLength);
    }
    return false;
}

/**
 * @returns the first entry containing the target, or null; stops scanning at the first hit
 */
export function findMatchingEntry(
    entries: readonly string[],
    target: TargetAddress
): string | null {
    for (const entry of entries) {
        if (entryContains(entry, target)) {
            return entry;
        }
    }
    return null;
}
