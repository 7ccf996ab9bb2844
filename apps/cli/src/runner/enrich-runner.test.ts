import type { LoggerMethods } from '@tagsense/logger';
import type { RunReport } from '@tagsense/model';
import type { LanguageModel } from 'ai';

import {
  MagickRegionRenderer,
  PdfStructureDocument,
} from '@tagsense/pdf-document';
import { LLMAuthenticationError, LLMTokenUsageAggregator } from '@tagsense/shared';
import {
  EnrichmentOrchestrator,
  FragmentProcessor,
  UnsupportedInputError,
  buildTagGroups,
} from '@tagsense/tag-enricher';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import type { EnrichSettings } from '../options/enrich-options';
import type { ModelFactory } from './model-factory';

import { runEnrichment } from './enrich-runner';

vi.mock('@tagsense/pdf-document', () => ({
  PdfStructureDocument: {
    open: vi.fn(),
  },
  MagickRegionRenderer: vi.fn(),
}));

vi.mock('@tagsense/tag-enricher', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@tagsense/tag-enricher')>();
  return {
    ...actual,
    EnrichmentOrchestrator: vi.fn(),
    FragmentProcessor: vi.fn(),
    buildTagGroups: vi.fn(),
  };
});

function createSettings(overrides: Partial<EnrichSettings> = {}): EnrichSettings {
  return {
    input: 'in.pdf',
    output: 'out.pdf',
    apiKey: 'test-secret',
    modelId: 'gpt-4o-mini',
    tagPattern: /Table/y,
    surroundCount: 4,
    concurrency: 10,
    zoom: 2,
    verbose: false,
    request: {
      operation: 'table-summary',
      language: 'en',
      mathMlVersion: 'mathml-4',
      overwrite: false,
      mathMlExisting: 'always',
      promptSource: '',
    },
    ...overrides,
  };
}

const REPORT: RunReport = { total: 1, done: 1, skipped: 0, failed: 0, outcomes: [] };

describe('runEnrichment', () => {
  let logger: LoggerMethods;
  let model: LanguageModel;
  let modelFactory: Mock<ModelFactory>;
  let document: {
    structureRoot: ReturnType<typeof vi.fn>;
    mediaBox: ReturnType<typeof vi.fn>;
    save: ReturnType<typeof vi.fn>;
  };
  let run: ReturnType<typeof vi.fn>;
  let processFragment: ReturnType<typeof vi.fn>;
  const root = { rawType: 'Document' };
  const groups = [{ tags: [], targetIndex: 0 }];
  const renderer = { renderRegion: vi.fn() };

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    model = 'gpt-4o-mini';
    modelFactory = vi.fn(() => model);

    document = {
      structureRoot: vi.fn().mockReturnValue(root),
      mediaBox: vi.fn().mockReturnValue({ left: 0, bottom: 0, right: 612, top: 792 }),
      save: vi.fn().mockResolvedValue(undefined),
    };
    vi.mocked(PdfStructureDocument.open).mockResolvedValue(
      document as unknown as PdfStructureDocument,
    );
    vi.mocked(buildTagGroups).mockReturnValue(groups as never);
    vi.mocked(MagickRegionRenderer).mockImplementation(function () {
      return renderer as unknown as MagickRegionRenderer;
    });

    run = vi.fn().mockResolvedValue(REPORT);
    vi.mocked(EnrichmentOrchestrator).mockImplementation(function () {
      return { run } as unknown as EnrichmentOrchestrator;
    });

    processFragment = vi.fn().mockResolvedValue(undefined);
    vi.mocked(FragmentProcessor).mockImplementation(function () {
      return { process: processFragment } as unknown as FragmentProcessor;
    });
  });

  describe('PDF input', () => {
    test('opens, enriches and saves the document', async () => {
      const settings = createSettings();

      const result = await runEnrichment(settings, logger, modelFactory);

      expect(result).toEqual({ mode: 'pdf', report: REPORT });
      expect(modelFactory).toHaveBeenCalledWith('test-secret', 'gpt-4o-mini');
      expect(PdfStructureDocument.open).toHaveBeenCalledWith('in.pdf', logger);
      expect(buildTagGroups).toHaveBeenCalledWith(root, settings.tagPattern, 4);
      expect(EnrichmentOrchestrator).toHaveBeenCalledWith(
        logger,
        model,
        renderer,
        { concurrency: 10, zoom: 2 },
        undefined,
        expect.any(LLMTokenUsageAggregator),
      );
      expect(run).toHaveBeenCalledWith(groups, settings.request);
      expect(document.save).toHaveBeenCalledWith('out.pdf');
    });

    test('renders from the input file with the document media boxes', async () => {
      await runEnrichment(createSettings(), logger, modelFactory);

      expect(MagickRegionRenderer).toHaveBeenCalledWith(logger, 'in.pdf', expect.any(Function));
      const mediaBox = vi.mocked(MagickRegionRenderer).mock.calls[0][2];
      expect(mediaBox(1)).toEqual({ left: 0, bottom: 0, right: 612, top: 792 });
      expect(document.mediaBox).toHaveBeenCalledWith(1);
    });

    test('passes concurrency, zoom and surrounding tag count through', async () => {
      await runEnrichment(
        createSettings({ concurrency: 3, zoom: 1.5, surroundCount: 6 }),
        logger,
        modelFactory,
      );

      expect(buildTagGroups).toHaveBeenCalledWith(root, /Table/y, 6);
      expect(vi.mocked(EnrichmentOrchestrator).mock.calls[0][3]).toEqual({
        concurrency: 3,
        zoom: 1.5,
      });
    });

    test('does not save when authentication fails', async () => {
      run.mockRejectedValue(new LLMAuthenticationError('Invalid API key', 401));

      await expect(runEnrichment(createSettings(), logger, modelFactory)).rejects.toBeInstanceOf(
        LLMAuthenticationError,
      );
      expect(document.save).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith('[TokenUsage] No token usage to report');
    });

    test('stops before enrichment when the document cannot be opened', async () => {
      vi.mocked(PdfStructureDocument.open).mockRejectedValue(new Error('Failed to open PDF'));

      await expect(runEnrichment(createSettings(), logger, modelFactory)).rejects.toThrow(
        'Failed to open PDF',
      );
      expect(EnrichmentOrchestrator).not.toHaveBeenCalled();
    });

    test('propagates a missing structure tree without saving', async () => {
      document.structureRoot.mockImplementation(() => {
        throw new Error('PDF has no structure tree');
      });

      await expect(runEnrichment(createSettings(), logger, modelFactory)).rejects.toThrow(
        'PDF has no structure tree',
      );
      expect(run).not.toHaveBeenCalled();
      expect(document.save).not.toHaveBeenCalled();
    });
  });

  describe('fragment input', () => {
    test('hands images to FragmentProcessor', async () => {
      const settings = createSettings({
        input: 'figure.png',
        output: 'figure.txt',
        request: { ...createSettings().request, operation: 'alt-text' },
      });

      const result = await runEnrichment(settings, logger, modelFactory);

      expect(result).toEqual({ mode: 'image' });
      expect(FragmentProcessor).toHaveBeenCalledWith(
        logger,
        model,
        undefined,
        undefined,
        expect.any(LLMTokenUsageAggregator),
      );
      expect(processFragment).toHaveBeenCalledWith(
        'image',
        'figure.png',
        'figure.txt',
        settings.request,
      );
      expect(PdfStructureDocument.open).not.toHaveBeenCalled();
    });

    test('hands JSON envelopes to FragmentProcessor', async () => {
      const settings = createSettings({ input: 'request.json', output: 'response.json' });

      await runEnrichment(settings, logger, modelFactory);

      expect(processFragment).toHaveBeenCalledWith(
        'json',
        'request.json',
        'response.json',
        settings.request,
      );
    });

    test('rejects unsupported combinations before creating a model', async () => {
      const settings = createSettings({ input: 'notes.docx', output: 'notes.pdf' });

      await expect(runEnrichment(settings, logger, modelFactory)).rejects.toBeInstanceOf(
        UnsupportedInputError,
      );
      expect(modelFactory).not.toHaveBeenCalled();
    });
  });
});
