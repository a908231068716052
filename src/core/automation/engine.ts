import { DiscoveryResult, HarvestConfig, HarvestResult } from '../../types';
import { ExtractorRegistry } from '../../types/extraction';
import { CheckpointWriter } from '../../output/checkpoint';
import { Logger } from '../../utils/logger';
import { formatRunId, Sleep } from '../../utils/time';
import { BrowserSession, SessionFactory } from '../browser/session';
import { discoverLinks } from '../navigation/flow';
import { capturePass } from './capture';
import { createRunContext, RunContext } from './context';
import { enrichPass } from './enrich';
import { createDefaultRegistry } from './init';
import { formatSessionSummary } from './stats';

const MIN_COVERAGE = 0.8;

export interface HarvestEngineOptions {
  logger?: Logger;
  sleep?: Sleep;
  now?: () => Date;
  runId?: string;
  registry?: ExtractorRegistry;
}

/**
 * Runs one harvest: discovery, Pass 1 capture, Pass 2 enrichment, final
 * artifacts. Only a browser that cannot be started aborts the run; every
 * later failure is contained in its stage.
 */
export class HarvestEngine<TElement = unknown> {
  constructor(
    private config: HarvestConfig,
    private openSession: SessionFactory<TElement>,
    private options: HarvestEngineOptions = {}
  ) {}

  async run(): Promise<HarvestResult> {
    const ctx = createRunContext(this.config, this.options);
    const logger = ctx.logger;
    const runId = this.options.runId ?? formatRunId(ctx.now());
    const registry = this.options.registry ?? createDefaultRegistry();
    const checkpoint = new CheckpointWriter({
      outputDir: this.config.outputDir,
      filePrefix: this.config.filePrefix,
      runId,
      logger,
    });

    ctx.stats.start();
    logger.info('Starting harvest', { url: this.config.listingUrl, runId });

    let session: BrowserSession<TElement>;
    try {
      session = await this.openSession();
    } catch (error) {
      ctx.stats.finish();
      logger.error('Failed to start browser session', { error });
      throw error;
    }

    let discovery: DiscoveryResult;
    try {
      discovery = await discoverLinks(session, ctx);
      capturePass(discovery.links, ctx, checkpoint);
      checkpoint.snapshot(ctx.records.values());
      await enrichPass(session, ctx, checkpoint, registry);
      this.checkCoverage(ctx, discovery);
    } finally {
      await this.closeSession(session, logger);
      ctx.stats.finish();
    }

    const records = ctx.records.values();
    const artifacts = checkpoint.finalize(records);
    const stats = ctx.stats.snapshot();
    for (const line of formatSessionSummary(stats, records.length)) logger.info(line);

    return { records, stats, discovery, artifacts };
  }

  private checkCoverage(ctx: RunContext, discovery: DiscoveryResult): void {
    const discovered = discovery.links.length;
    const captured = ctx.records.size;
    if (discovered > 0 && captured < discovered * MIN_COVERAGE) {
      ctx.logger.error('Captured far fewer records than links discovered', { discovered, captured });
    }
  }

  private async closeSession(session: BrowserSession<TElement>, logger: Logger): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      logger.warn('Failed to close browser session', { error });
    }
  }
}
