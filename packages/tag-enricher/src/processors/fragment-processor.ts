import type { LoggerMethods } from '@tagsense/logger';
import type {
  EnrichmentRequest,
  OperationKind,
  RenderedImage,
} from '@tagsense/model';
import type { LLMTokenUsageAggregator } from '@tagsense/shared';
import type { LanguageModel } from 'ai';

import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { z } from 'zod';

import {
  IMAGE_MEDIA_TYPES,
  MAX_OUTPUT_TOKENS,
  XML_MAX_OUTPUT_TOKENS,
} from '../config/constants';
import type { BaseLLMComponentOptions } from '../core/base-llm-component';
import { VisionLLMComponent } from '../core/vision-llm-component';
import {
  ImageReadError,
  TagEnricherError,
  UnsupportedInputError,
} from '../errors/tag-enricher-error';
import { buildMathMlDocument } from '../mutations/mutation-policy';
import { PromptAssembler } from '../prompts/prompt-assembler';

export type InputMode = 'pdf' | 'image' | 'xml' | 'json';

export type FragmentInputMode = Exclude<InputMode, 'pdf'>;

/**
 * Decide how an input is processed from the input and output extensions.
 *
 * Accepted: PDF to PDF, image to TXT or XML, XML to TXT (alt text only),
 * JSON to JSON.
 */
export function resolveInputMode(
  input: string,
  output: string,
  operation: OperationKind,
): InputMode {
  const inputExt = extname(input).toLowerCase();
  const outputExt = extname(output).toLowerCase();

  if (inputExt === '.pdf' && outputExt === '.pdf') return 'pdf';
  if (inputExt in IMAGE_MEDIA_TYPES && (outputExt === '.txt' || outputExt === '.xml')) {
    return 'image';
  }
  if (inputExt === '.xml' && outputExt === '.txt' && operation === 'alt-text') {
    return 'xml';
  }
  if (inputExt === '.json' && outputExt === '.json') return 'json';

  throw new UnsupportedInputError(
    `Unsupported input/output combination for ${operation}: ${inputExt || '(none)'} -> ${outputExt || '(none)'}`,
  );
}

const JsonInputSchema = z.object({
  image: z.string().min(1),
});

const DATA_URL = /^data:([^;,]+);base64,([\s\S]*)$/;

/**
 * Media type from the first bytes of an image, jpeg when unknown
 */
export function sniffImageType(data: Uint8Array): string {
  const ascii = (start: number, end: number) =>
    String.fromCharCode(...data.subarray(start, end));

  if (data[0] === 0x89 && ascii(1, 4) === 'PNG') return 'image/png';
  if (ascii(0, 3) === 'GIF') return 'image/gif';
  if (ascii(0, 4) === 'RIFF' && ascii(8, 12) === 'WEBP') return 'image/webp';
  return 'image/jpeg';
}

/**
 * Decode the `image` field of a JSON input: a data URL or bare base64
 */
export function decodeImageField(value: string): RenderedImage {
  const match = DATA_URL.exec(value.trim());
  const data = new Uint8Array(
    Buffer.from(match ? match[2] : value.trim(), 'base64'),
  );
  if (data.length === 0) {
    throw new ImageReadError('JSON input "image" holds no image data');
  }
  return { data, mediaType: match ? match[1] : sniffImageType(data) };
}

/**
 * FragmentProcessor
 *
 * Handles inputs that carry no structure tree: a single image, a MathML
 * XML file, or a JSON envelope with a base64 image. One request is made
 * per input and the answer is written to the output file.
 */
export class FragmentProcessor extends VisionLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, 'FragmentProcessor', options, fallbackModel, aggregator);
  }

  async process(
    mode: FragmentInputMode,
    input: string,
    output: string,
    request: EnrichmentRequest,
  ): Promise<void> {
    const assembler = new PromptAssembler(request.promptSource);
    this.log('info', `Processing ${mode} input ${input} (${request.operation})`);

    switch (mode) {
      case 'image': {
        const image = await this.readImage(input);
        const answer = await this.describeImage(image, assembler, request);
        const content =
          request.operation === 'mathml' && extname(output).toLowerCase() === '.xml'
            ? buildMathMlDocument(answer)
            : answer;
        await this.writeOutput(output, content);
        break;
      }
      case 'xml': {
        const answer = await this.describeXml(input, assembler, request);
        await this.writeOutput(output, answer);
        break;
      }
      case 'json': {
        const image = await this.readJsonImage(input);
        const answer = await this.describeImage(image, assembler, request);
        await this.writeOutput(output, `${JSON.stringify({ content: answer }, null, 2)}\n`);
        break;
      }
    }

    this.log('info', `Wrote ${request.operation} to ${output}`);
  }

  private async describeImage(
    image: RenderedImage,
    assembler: PromptAssembler,
    request: EnrichmentRequest,
  ): Promise<string> {
    const prompt = assembler.assemble({
      operation: request.operation,
      isXmlInput: false,
      language: request.language,
      mathMlVersion: request.mathMlVersion,
    });

    const answer = await this.callVisionLLM(prompt, request.operation, {
      image,
      maxOutputTokens: MAX_OUTPUT_TOKENS[request.operation],
    });
    if (!answer) {
      this.log('warn', 'Model returned no text');
    }
    return answer;
  }

  private async describeXml(
    input: string,
    assembler: PromptAssembler,
    request: EnrichmentRequest,
  ): Promise<string> {
    let xml: string;
    try {
      xml = await readFile(input, 'utf-8');
    } catch (error) {
      throw TagEnricherError.fromError(`Failed to read XML input ${input}`, error);
    }

    const prompt = assembler.assemble({
      operation: request.operation,
      isXmlInput: true,
      language: request.language,
      mathMlVersion: request.mathMlVersion,
    });

    return this.callVisionLLM(prompt, `${request.operation}-xml`, {
      attachments: [`\`\`\`xml\n${xml.trim()}\n\`\`\``],
      maxOutputTokens: XML_MAX_OUTPUT_TOKENS,
      temperature: 0,
    });
  }

  private async readImage(input: string): Promise<RenderedImage> {
    const mediaType = IMAGE_MEDIA_TYPES[extname(input).toLowerCase()];
    if (!mediaType) {
      throw new UnsupportedInputError(`Unsupported image type: ${input}`);
    }

    try {
      const data = new Uint8Array(await readFile(input));
      if (data.length === 0) {
        throw new Error('file is empty');
      }
      return { data, mediaType };
    } catch (error) {
      throw ImageReadError.fromError(`Failed to read image ${input}`, error);
    }
  }

  private async readJsonImage(input: string): Promise<RenderedImage> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(input, 'utf-8'));
    } catch (error) {
      throw ImageReadError.fromError(`Failed to read JSON input ${input}`, error);
    }

    const result = JsonInputSchema.safeParse(parsed);
    if (!result.success) {
      throw new ImageReadError(
        `JSON input ${input} must be an object with a non-empty "image" string`,
      );
    }
    return decodeImageField(result.data.image);
  }

  private async writeOutput(output: string, content: string): Promise<void> {
    try {
      await writeFile(output, content, 'utf-8');
    } catch (error) {
      throw TagEnricherError.fromError(`Failed to write output ${output}`, error);
    }
  }
}
