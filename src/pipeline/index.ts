import {
    Classifier,
    ClassificationDecision,
    CompanyRecord,
    Disposition,
    EntityStage,
    IncludedDisposition,
    RowSink,
    RunSummary,
    SheetRow,
    SkipReason,
    SkippedDisposition,
} from '../types';
import { WebsiteResolver } from '../modules/resolver';
import { LinkValidator } from '../modules/validity';
import { Budget, Clock, DeadlineManager, DeadlineOutcome, systemClock } from '../modules/deadline';
import { UNKNOWN_INDUSTRY } from '../modules/classifier';
import { logger, Metrics } from '../modules/observability';
import { SinkFailureError, errorMessage } from '../utils/errors';
import { sleep } from '../utils/retry';

export interface PipelineSettings {
    minResolverScore: number;
    perEntityBudgetSecs: number;
    resolverBudgetFraction: number;
    maxLivenessTimeoutSecs: number;
    minStageBudgetSecs: number;
    dropDeadLinks: boolean;
    /** Substrings that disqualify a resolved URL. */
    blacklistDomains: string[];
    sinkBatchSize: number;
    entityDelayMs: number;
}

export interface PipelineDeps {
    resolver: WebsiteResolver;
    validator: LinkValidator;
    classifier: Classifier;
    sink: RowSink;
    deadlines: DeadlineManager;
    clock?: Clock;
}

export interface RunResult {
    summary: RunSummary;
    dispositions: Disposition[];
}

const skipped = (name: string, reason: SkipReason, url: string | null, detail: string): SkippedDisposition =>
    Object.freeze({ kind: 'skipped', name, reason, url, detail });

/**
 * Drives one entity at a time through RESOLVING -> VALIDATING -> CLASSIFYING -> DISPOSED
 * inside a per-entity wall-clock budget. Per-entity failures become skip dispositions;
 * only sink failures end a run early.
 */
export class Pipeline {
    private readonly clock: Clock;

    constructor(private readonly deps: PipelineDeps, private readonly settings: PipelineSettings) {
        this.clock = deps.clock ?? systemClock;
    }

    async processEntity(name: string): Promise<Disposition> {
        const { resolver, validator, deadlines } = this.deps;
        const s = this.settings;
        const budget = new Budget(s.perEntityBudgetSecs * 1000, this.clock);

        // RESOLVING
        this.enter(EntityStage.RESOLVING, name);
        const resolveSecs = Math.max(s.minStageBudgetSecs, s.perEntityBudgetSecs * s.resolverBudgetFraction);
        const resolved = await deadlines.runWithDeadline(
            resolveSecs,
            signal => resolver.resolve(name, s.minResolverScore, signal),
            `resolution of "${name}"`,
        );
        if (resolved.status === 'deadline_exceeded' || this.overranSoftly(resolved, resolveSecs)) {
            return this.dispose(skipped(name, SkipReason.RESOLUTION_TIMEOUT, null,
                `Timed out (> ${resolveSecs.toFixed(1)}s) during search`));
        }

        const website = resolved.value;
        if (!website) {
            return this.dispose(skipped(name, SkipReason.NO_CANDIDATE_FOUND, null, 'No site found via search'));
        }

        const link = validator.normalize(website);
        if (!link) {
            return this.dispose(skipped(name, SkipReason.INVALID_URL_SCHEME, website, 'Not an http(s) URL'));
        }

        const lowerLink = link.toLowerCase();
        const blocked = s.blacklistDomains.find(b => lowerLink.includes(b.toLowerCase()));
        if (blocked) {
            return this.dispose(skipped(name, SkipReason.BLACKLISTED_DOMAIN, link, `Matches blacklist entry "${blocked}"`));
        }

        // VALIDATING
        if (budget.exhausted()) {
            return this.dispose(skipped(name, SkipReason.LIVENESS_TIMEOUT, link, 'Budget exhausted before live check'));
        }
        this.enter(EntityStage.VALIDATING, name);
        const liveSecs = Math.max(s.minStageBudgetSecs, Math.min(budget.remainingMs() / 1000, s.maxLivenessTimeoutSecs));
        const checked = await deadlines.runWithDeadline(
            liveSecs,
            signal => validator.checkLive(link, liveSecs * 1000, signal),
            `live check of ${link}`,
        );
        if (checked.status === 'deadline_exceeded' || this.overranSoftly(checked, liveSecs)) {
            return this.dispose(skipped(name, SkipReason.LIVENESS_TIMEOUT, link,
                `Timed out (> ${liveSecs.toFixed(1)}s) during live check`));
        }

        const liveness = checked.value;
        let url = link;
        if (liveness.isLive) {
            url = liveness.finalUrl;
        } else if (s.dropDeadLinks) {
            return this.dispose(skipped(name, SkipReason.DEAD_LINK, link, `DEAD link (status=${liveness.statusCode ?? 'none'})`));
        } else {
            logger.info(`[Pipeline] Keeping dead link for ${name}`, { url: link, status: liveness.statusCode });
        }

        // CLASSIFYING
        if (budget.exhausted()) {
            return this.dispose(skipped(name, SkipReason.LIVENESS_TIMEOUT, url, 'Budget exhausted before classification'));
        }
        this.enter(EntityStage.CLASSIFYING, name);
        const decision = await this.classify(name, url);
        if (!decision.include) {
            return this.dispose(decision.degraded
                ? skipped(name, SkipReason.CLASSIFICATION_FAILURE, url, 'Classifier failed; excluded by default')
                : skipped(name, SkipReason.EXCLUDED_BY_CLASSIFIER, url, `Filtered out by classifier (${decision.industryTag})`));
        }

        const included: IncludedDisposition = Object.freeze({
            kind: 'included',
            name,
            industryTag: decision.industryTag,
            url,
            linkStatus: liveness.isLive ? 'live' : 'dead',
            statusCode: liveness.statusCode,
        });
        return this.dispose(included);
    }

    /**
     * Consumes the source sequentially. Accepted rows are flushed to the sink every
     * `sinkBatchSize` rows and once more at the end.
     */
    async run(source: AsyncIterable<CompanyRecord>, options: { sourceKey?: string; maxItems?: number } = {}): Promise<RunResult> {
        const { sink } = this.deps;
        const s = this.settings;
        const metrics = new Metrics();
        const dispositions: Disposition[] = [];
        let pending: SheetRow[] = [];
        let consumed = 0;

        const flush = async () => {
            if (pending.length === 0) return;
            try {
                await sink.appendRows(pending);
                logger.info(`[Pipeline] Flushed ${pending.length} rows to sink`);
                pending = [];
            } catch (e) {
                logger.logError('[Pipeline] Sink append failed', e);
                throw new SinkFailureError(`Sink append failed: ${errorMessage(e)}`, dispositions, pending, e);
            }
        };

        for await (const company of source) {
            const name = (company.name || '').trim();
            if (!name) continue;
            consumed++;

            const started = this.clock.now();
            const disposition = await this.processEntity(name);
            dispositions.push(disposition);
            metrics.record(disposition, this.clock.now() - started);

            if (disposition.kind === 'included') {
                pending.push([disposition.name, disposition.industryTag, disposition.url]);
                if (pending.length >= s.sinkBatchSize) await flush();
            }

            if (options.maxItems && consumed >= options.maxItems) break;
            if (s.entityDelayMs > 0) await sleep(s.entityDelayMs);
        }

        await flush();

        const stats = metrics.getSummary();
        const summary: RunSummary = {
            source: options.sourceKey ?? 'unknown',
            total: stats.total,
            included: stats.included,
            noSiteFound: stats.no_site,
            deadLinksSkipped: stats.dead_skipped,
            skippedByReason: stats.skipped_by_reason,
            pushedToSink: sink.persistent,
            dropDeadLinks: s.dropDeadLinks,
            perEntityBudgetSecs: s.perEntityBudgetSecs,
            resolverBudgetFraction: s.resolverBudgetFraction,
            deadlineMode: this.deps.deadlines.mode,
            avgLatencyMs: stats.avg_latency,
        };
        logger.info('[Pipeline] Run finished', summary);
        return { summary, dispositions };
    }

    private async classify(name: string, url: string): Promise<ClassificationDecision> {
        try {
            return await this.deps.classifier.classify(name, url);
        } catch (e) {
            logger.logError(`[Pipeline] Classifier threw for ${name}`, e);
            return { include: false, industryTag: UNKNOWN_INDUSTRY, degraded: true };
        }
    }

    // A hard deadline has already cut the stage off when it expired, so only soft outcomes are judged late
    private overranSoftly(outcome: DeadlineOutcome<unknown>, seconds: number): boolean {
        return this.deps.deadlines.mode === 'soft' && DeadlineManager.overran(outcome, seconds);
    }

    private enter(stage: EntityStage, name: string): void {
        logger.debug(`[Pipeline] ${name} -> ${stage}`);
    }

    private dispose<D extends Disposition>(disposition: D): D {
        this.enter(EntityStage.DISPOSED, disposition.name);
        if (disposition.kind === 'included') {
            logger.info(`[Pipeline] Included ${disposition.name} -> ${disposition.url} [${disposition.industryTag}]`);
        } else {
            logger.info(`[Pipeline] Skipped ${disposition.name}: ${disposition.reason}`, { url: disposition.url, detail: disposition.detail });
        }
        return disposition;
    }
}
