import type { LoggerMethods } from '@tagsense/logger';
import type {
  EnrichmentRequest,
  RegionRenderer,
  RunReport,
  SkipReason,
  StructureNode,
  TagGroup,
  TagOutcome,
  TagOutcomeStatus,
} from '@tagsense/model';
import type { LLMTokenUsageAggregator } from '@tagsense/shared';
import type { LanguageModel } from 'ai';

import { ConcurrentPool, LLMAuthenticationError } from '@tagsense/shared';

import { ENRICHMENT, MAX_OUTPUT_TOKENS } from '../config/constants';
import { MUTATION_POLICIES } from '../mutations/mutation-policy';
import { PromptAssembler } from '../prompts/prompt-assembler';
import { formatTagIdentity, resolveTargetPage } from '../utils/tag-identity';
import type { BaseLLMComponentOptions } from './base-llm-component';
import { VisionLLMComponent } from './vision-llm-component';

/**
 * Options for EnrichmentOrchestrator
 */
export interface EnrichmentOrchestratorOptions extends BaseLLMComponentOptions {
  /**
   * Groups processed at the same time after the first one (default: 10)
   */
  concurrency?: number;

  /**
   * Render scale for target regions (default: 2)
   */
  zoom?: number;
}

/**
 * State shared by the tasks of one run
 */
interface RunContext {
  request: EnrichmentRequest;
  assembler: PromptAssembler;
  attempted: Set<StructureNode>;
}

/**
 * The target a task works on, resolved once
 */
interface TaskScope {
  target: StructureNode;
  page: number | null;
  label: string;
}

/**
 * EnrichmentOrchestrator
 *
 * Generates text for the target of every tag group and writes it back onto
 * the structure tree.
 *
 * Per target: resolve page, resolve bounding box, pre-check existing content,
 * render the region, assemble the prompt, request text, apply the mutation.
 *
 * The first group runs alone so that a rejected API key stops the run before
 * any other request is made. The remaining groups run on a worker pool; each
 * task writes only to its own target. Ordinary failures are logged and
 * counted per tag. An authentication failure inside the pool is raised once
 * every submitted task has settled.
 *
 * The document is never saved here; the caller saves after `run` resolves.
 */
export class EnrichmentOrchestrator extends VisionLLMComponent {
  private readonly concurrency: number;
  private readonly zoom: number;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    private readonly renderer: RegionRenderer,
    options?: EnrichmentOrchestratorOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      'EnrichmentOrchestrator',
      options,
      fallbackModel,
      aggregator,
    );
    this.concurrency = options?.concurrency ?? ENRICHMENT.DEFAULT_CONCURRENCY;
    this.zoom = options?.zoom ?? ENRICHMENT.DEFAULT_ZOOM;
  }

  /**
   * Enrich every group's target
   *
   * @throws LLMAuthenticationError when the provider rejects the API key
   */
  async run(
    groups: readonly TagGroup[],
    request: EnrichmentRequest,
  ): Promise<RunReport> {
    const context: RunContext = {
      request,
      assembler: new PromptAssembler(request.promptSource),
      attempted: new Set(),
    };
    const outcomes: TagOutcome[] = [];

    this.log('info', `Processing ${groups.length} matching tags (${request.operation})`);

    const [first, ...rest] = groups;
    if (first) {
      outcomes.push(await this.processGroup(first, context));
    }

    let authError: LLMAuthenticationError | undefined;
    let finished = outcomes.length;
    const settled = await ConcurrentPool.runSettled(
      rest,
      this.concurrency,
      (group) => this.processGroup(group, context),
      () => {
        finished++;
        this.log('debug', `Progress: ${finished}/${groups.length}`);
      },
    );

    for (const [index, result] of settled.entries()) {
      if (result.status === 'fulfilled') {
        outcomes.push(result.value);
      } else if (result.reason instanceof LLMAuthenticationError) {
        authError ??= result.reason;
      } else {
        const target = rest[index].tags[rest[index].targetIndex];
        outcomes.push(this.failed({ target, page: null, label: '' }, result.reason));
      }
    }

    if (authError) {
      this.log('error', 'Model provider rejected the API key, aborting');
      throw authError;
    }

    const report = this.summarize(outcomes);
    this.log(
      'info',
      `Finished: ${report.done} done, ${report.skipped} skipped, ${report.failed} failed`,
    );
    return report;
  }

  /**
   * Process one group; resolves with an outcome unless authentication failed
   */
  private async processGroup(
    group: TagGroup,
    context: RunContext,
  ): Promise<TagOutcome> {
    const target = group.tags[group.targetIndex];
    const duplicate = context.attempted.has(target);
    context.attempted.add(target);

    const task: TaskScope = {
      target,
      page: null,
      label: formatTagIdentity(target, null),
    };

    try {
      task.page = resolveTargetPage(target);
      task.label = formatTagIdentity(target, task.page);

      if (duplicate) {
        return this.skipped(task, 'duplicate', 'already processed in this run');
      }
      return await this.enrichTarget(group, task, context);
    } catch (error) {
      if (error instanceof LLMAuthenticationError) {
        throw error;
      }
      this.log('error', `Failed to process ${task.label}: ${errorMessage(error)}`);
      return this.failed(task, error);
    }
  }

  private async enrichTarget(
    group: TagGroup,
    task: TaskScope,
    { request, assembler }: RunContext,
  ): Promise<TagOutcome> {
    const { target, page, label } = task;

    if (page === null) {
      return this.skipped(task, 'no-page', 'page number cannot be determined');
    }

    const box = target.boundingBox(page);
    if (!box || box.right - box.left <= 0 || box.top - box.bottom <= 0) {
      return this.skipped(task, 'no-bbox', 'bounding box cannot be determined');
    }

    const policy = MUTATION_POLICIES[request.operation];
    if (policy.shouldSkip(target, request)) {
      return this.skipped(
        task,
        'existing-content',
        `${request.operation} already present`,
      );
    }

    this.log('debug', `Rendering ${label}`);
    const image = await this.renderer.renderRegion(page, box, this.zoom);

    const prompt = assembler.assemble({
      operation: request.operation,
      isXmlInput: false,
      language: request.language,
      mathMlVersion: request.mathMlVersion,
      group,
    });

    this.log('debug', `Requesting ${request.operation} for ${label}`);
    const text = await this.callVisionLLM(prompt, request.operation, {
      image,
      maxOutputTokens: MAX_OUTPUT_TOKENS[request.operation],
    });

    if (!text) {
      return this.skipped(task, 'empty-response', 'model returned no text');
    }

    policy.apply(target, text, request);
    this.log('info', `Set ${request.operation} for ${label}`);
    return this.outcome(task, 'done');
  }

  private failed(task: TaskScope, error: unknown): TagOutcome {
    return this.outcome(task, 'failed', { error: errorMessage(error) });
  }

  private skipped(task: TaskScope, reason: SkipReason, message: string): TagOutcome {
    this.log('info', `Skipping ${task.label}: ${message}`);
    return this.outcome(task, 'skipped', { reason });
  }

  private outcome(
    { target, page }: TaskScope,
    status: TagOutcomeStatus,
    extra: Pick<TagOutcome, 'reason' | 'error'> = {},
  ): TagOutcome {
    return { id: target.id, rawType: target.rawType, page, status, ...extra };
  }

  private summarize(outcomes: TagOutcome[]): RunReport {
    const count = (status: TagOutcomeStatus) =>
      outcomes.filter((outcome) => outcome.status === status).length;

    return {
      total: outcomes.length,
      done: count('done'),
      skipped: count('skipped'),
      failed: count('failed'),
      outcomes,
    };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
