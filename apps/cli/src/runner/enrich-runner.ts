import type { LoggerMethods } from '@tagsense/logger';
import type { RunReport } from '@tagsense/model';
import type { LanguageModel } from 'ai';

import {
  MagickRegionRenderer,
  PdfStructureDocument,
} from '@tagsense/pdf-document';
import { LLMTokenUsageAggregator } from '@tagsense/shared';
import {
  EnrichmentOrchestrator,
  FragmentProcessor,
  buildTagGroups,
  resolveInputMode,
} from '@tagsense/tag-enricher';

import type { EnrichSettings } from '../options/enrich-options';

import { type ModelFactory, createModel } from './model-factory';

/**
 * Result of one enrichment run; `report` is set for PDF inputs
 */
export interface EnrichResult {
  mode: ReturnType<typeof resolveInputMode>;
  report?: RunReport;
}

/**
 * Run one enrichment subcommand end to end.
 *
 * PDF inputs are opened, enriched tag by tag and saved to the output path.
 * Any other supported input is handled by FragmentProcessor. Token usage
 * is logged whether or not the run succeeds.
 *
 * @throws UnsupportedInputError for an unsupported input/output pair
 * @throws LLMAuthenticationError when the provider rejects the key; the
 *   output PDF is not written
 */
export async function runEnrichment(
  settings: EnrichSettings,
  logger: LoggerMethods,
  modelFactory: ModelFactory = createModel,
): Promise<EnrichResult> {
  const mode = resolveInputMode(settings.input, settings.output, settings.request.operation);
  const model = modelFactory(settings.apiKey, settings.modelId);
  const aggregator = new LLMTokenUsageAggregator();

  try {
    if (mode === 'pdf') {
      const report = await enrichPdf(settings, logger, model, aggregator);
      return { mode, report };
    }

    const processor = new FragmentProcessor(logger, model, undefined, undefined, aggregator);
    await processor.process(mode, settings.input, settings.output, settings.request);
    return { mode };
  } finally {
    aggregator.logSummary(logger);
  }
}

async function enrichPdf(
  settings: EnrichSettings,
  logger: LoggerMethods,
  model: LanguageModel,
  aggregator: LLMTokenUsageAggregator,
): Promise<RunReport> {
  const document = await PdfStructureDocument.open(settings.input, logger);
  const root = document.structureRoot();
  const groups = buildTagGroups(root, settings.tagPattern, settings.surroundCount);

  const renderer = new MagickRegionRenderer(logger, settings.input, (page) =>
    document.mediaBox(page),
  );
  const orchestrator = new EnrichmentOrchestrator(
    logger,
    model,
    renderer,
    { concurrency: settings.concurrency, zoom: settings.zoom },
    undefined,
    aggregator,
  );

  const report = await orchestrator.run(groups, settings.request);
  await document.save(settings.output);
  return report;
}
