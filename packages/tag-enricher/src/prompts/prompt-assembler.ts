import type { MathMlVersion, OperationKind, TagGroup } from '@tagsense/model';

import { existsSync, readFileSync, statSync } from 'node:fs';

import { PROMPT } from '../config/constants';
import { extractContext } from '../extractors/context-extractor';
import { selectDefaultTemplate } from './default-templates';

/**
 * Per-request values for prompt assembly
 */
export interface PromptAssembleOptions {
  operation: OperationKind;
  isXmlInput: boolean;
  language: string;
  mathMlVersion: MathMlVersion;

  /**
   * Group around the target; omitted for standalone inputs
   */
  group?: TagGroup;
}

/**
 * Sentence placed at the target's position in the context JSON
 */
export function targetMarker(rawType: string): string {
  return `This is position of ${rawType} that you are generating text for.`;
}

/**
 * Replace `{lang}` and `{math_ml_version}`; remove any other `{name}`.
 */
export function fillPlaceholders(
  template: string,
  values: { lang: string; math_ml_version: string },
): string {
  return template.replace(/\{([^}]+)\}/g, (_match, name: string) => {
    if (name === 'lang') return values.lang;
    if (name === 'math_ml_version') return values.math_ml_version;
    return '';
  });
}

/**
 * JSON array of one-entry objects describing the group, target marked.
 *
 * Each non-target tag gets `floor(MAX_PROMPT_LENGTH / 2 / tags)` characters.
 */
export function buildGroupContext(group: TagGroup): string {
  const budget = Math.floor(PROMPT.MAX_PROMPT_LENGTH / 2 / group.tags.length);

  const entries = group.tags.map((node, index) => ({
    [node.rawType]:
      index === group.targetIndex
        ? targetMarker(node.rawType)
        : extractContext(node, budget),
  }));

  return JSON.stringify(entries, null, 1);
}

/**
 * PromptAssembler
 *
 * Builds the instruction text for one request from a template and the
 * target's surrounding tags. The template source is resolved once: an
 * existing file path is read, any other non-empty string is used as the
 * template itself, and an empty source selects the built-in templates.
 * Instances hold no per-request state and are shared by concurrent tasks.
 */
export class PromptAssembler {
  private readonly customTemplate: string | null;

  constructor(promptSource = '') {
    this.customTemplate = PromptAssembler.resolveSource(promptSource);
  }

  static resolveSource(source: string): string | null {
    if (!source.trim()) return null;
    if (existsSync(source) && statSync(source).isFile()) {
      return readFileSync(source, 'utf-8').trim();
    }
    return source;
  }

  get isCustom(): boolean {
    return this.customTemplate !== null;
  }

  assemble(options: PromptAssembleOptions): string {
    const hasContext = options.group !== undefined && options.group.tags.length > 1;
    const template =
      this.customTemplate ??
      selectDefaultTemplate(options.operation, hasContext, options.isXmlInput);

    const prompt = fillPlaceholders(template, {
      lang: options.language,
      math_ml_version: options.mathMlVersion,
    });

    if (hasContext && options.group) {
      return `${prompt}\n${buildGroupContext(options.group)}`;
    }
    return prompt;
  }
}
