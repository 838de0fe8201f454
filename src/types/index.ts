export type CompanyRecord = {
    name: string;
    website: string | null; // Always null when it leaves an upstream source
};

export type SearchResult = {
    title: string;
    url: string;
    snippet: string;
};

export type ScoredCandidate = {
    url: string;
    score: number;
};

export interface SearchProvider {
    readonly name: string;
    /**
     * Never rejects: transport failures, non-2xx responses and malformed payloads
     * all come back as an empty list.
     */
    search(query: string, signal?: AbortSignal): Promise<SearchResult[]>;
}

export type LivenessResult = {
    isLive: boolean;
    finalUrl: string;
    statusCode: number | null;
};

export type ClassificationDecision = {
    include: boolean;
    industryTag: string;
    /** True when the decision is the fallback for a failed or malformed classifier call. */
    degraded: boolean;
};

export interface Classifier {
    classify(name: string, url: string): Promise<ClassificationDecision>;
}

export type SheetRow = [name: string, industryTag: string, url: string];

export interface RowSink {
    readonly persistent: boolean;
    appendRows(rows: SheetRow[]): Promise<void>;
}

export enum EntityStage {
    RESOLVING = 'RESOLVING',
    VALIDATING = 'VALIDATING',
    CLASSIFYING = 'CLASSIFYING',
    DISPOSED = 'DISPOSED',
}

export enum SkipReason {
    RESOLUTION_TIMEOUT = 'ResolutionTimeout',
    NO_CANDIDATE_FOUND = 'NoCandidateFound',
    INVALID_URL_SCHEME = 'InvalidUrlScheme',
    BLACKLISTED_DOMAIN = 'BlacklistedDomain',
    LIVENESS_TIMEOUT = 'LivenessTimeout',
    DEAD_LINK = 'DeadLink',
    CLASSIFICATION_FAILURE = 'ClassificationFailure',
    EXCLUDED_BY_CLASSIFIER = 'ExcludedByClassifier',
}

export type IncludedDisposition = Readonly<{
    kind: 'included';
    name: string;
    industryTag: string;
    url: string;
    // 'dead' only when dead links are passed through instead of dropped
    linkStatus: 'live' | 'dead';
    statusCode: number | null;
}>;

export type SkippedDisposition = Readonly<{
    kind: 'skipped';
    name: string;
    reason: SkipReason;
    url: string | null;
    detail: string;
}>;

export type Disposition = IncludedDisposition | SkippedDisposition;

export type RunSummary = {
    source: string;
    total: number;
    included: number;
    noSiteFound: number;
    deadLinksSkipped: number;
    skippedByReason: Partial<Record<SkipReason, number>>;
    pushedToSink: boolean;
    dropDeadLinks: boolean;
    perEntityBudgetSecs: number;
    resolverBudgetFraction: number;
    deadlineMode: 'hard' | 'soft';
    avgLatencyMs: number;
};
