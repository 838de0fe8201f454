// Closed set, matched as whole words after punctuation has been turned into spaces
export const LEGAL_SUFFIXES = [
    'incorporated', 'inc', 'co', 'corp', 'corporation', 'llc', 'l\\.l\\.c', 'ltd', 'limited',
    'group', 'holdings', 'partners', 'technologies', 'technology', 'tech', 'systems',
    'solutions', 'services', 'company',
];

const SUFFIX_PATTERN = new RegExp(`\\b(${LEGAL_SUFFIXES.join('|')})\\b`, 'g');

export class Normalizer {

    /**
     * Comparison-only projection of a company name. Never use the result as an identity
     * or for display: "Acme HVAC Services LLC" becomes "acme hvac".
     */
    static normalizeCompany(raw: string): string {
        if (!raw) return '';
        let n = raw.toLowerCase();
        n = n.replace(/[,.\-&/|]+/g, ' ');
        n = n.replace(SUFFIX_PATTERN, '');
        return n.replace(/\s+/g, ' ').trim();
    }
}
