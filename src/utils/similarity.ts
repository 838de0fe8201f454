export class StringUtils {

    /**
     * Order-insensitive token overlap on a 0-100 integer scale.
     *
     * Tokens are whitespace-separated and compared verbatim, so callers lower-case first.
     * When one token set contains the other the score is 100; otherwise it is the best
     * Indel similarity among the shared tokens and the shared tokens extended by each
     * side's leftovers.
     */
    static tokenSetRatio(a: string, b: string): number {
        const tokensA = new Set(this.tokenize(a));
        const tokensB = new Set(this.tokenize(b));
        if (tokensA.size === 0 || tokensB.size === 0) return 0;

        const intersection = [...tokensA].filter(t => tokensB.has(t)).sort();
        const diffAB = [...tokensA].filter(t => !tokensB.has(t)).sort();
        const diffBA = [...tokensB].filter(t => !tokensA.has(t)).sort();

        if (intersection.length > 0 && (diffAB.length === 0 || diffBA.length === 0)) {
            return 100;
        }

        const sect = intersection.join(' ');
        const ab = diffAB.join(' ');
        const ba = diffBA.join(' ');
        const sep = sect.length > 0 ? 1 : 0;
        const sectAbLen = sect.length + sep + ab.length;
        const sectBaLen = sect.length + sep + ba.length;

        // Indel(sect + ab, sect + ba) reduces to Indel(ab, ba)
        let result = this.normalizedSimilarity(this.indelDistance(ab, ba), sectAbLen + sectBaLen);
        if (sect.length === 0) return Math.floor(result);

        // sect vs sect + ab differs only by the separator and ab itself
        result = Math.max(
            result,
            this.normalizedSimilarity(sep + ab.length, sect.length + sectAbLen),
            this.normalizedSimilarity(sep + ba.length, sect.length + sectBaLen),
        );
        return Math.floor(result);
    }

    /** Insertions plus deletions needed to turn one string into the other. */
    static indelDistance(s1: string, s2: string): number {
        return s1.length + s2.length - 2 * this.lcsLength(s1, s2);
    }

    private static normalizedSimilarity(distance: number, lengthSum: number): number {
        if (lengthSum === 0) return 100;
        return 100 - (100 * distance) / lengthSum;
    }

    private static lcsLength(s1: string, s2: string): number {
        if (s1.length === 0 || s2.length === 0) return 0;
        let prev = new Array<number>(s2.length + 1).fill(0);
        let curr = new Array<number>(s2.length + 1).fill(0);

        for (let i = 1; i <= s1.length; i++) {
            for (let j = 1; j <= s2.length; j++) {
                curr[j] = s1[i - 1] === s2[j - 1]
                    ? prev[j - 1] + 1
                    : Math.max(prev[j], curr[j - 1]);
            }
            [prev, curr] = [curr, prev];
        }
        return prev[s2.length];
    }

    private static tokenize(text: string): string[] {
        return text.split(/\s+/).filter(t => t.length > 0);
    }
}
