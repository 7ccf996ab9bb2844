import type { OperationKind } from '@tagsense/model';

interface TemplateSet {
  plain: string;
  withContext: string;
  xml?: string;
  xmlWithContext?: string;
}

const CONTEXT_INSTRUCTIONS = `Below the instructions is a JSON array describing the tags that surround the element in the document's structure tree, in reading order. Each entry maps a tag type to a short excerpt of its content. The entry that marks the position of the element you are working on holds a placeholder sentence instead of content. Use the surrounding content only to understand the element better; never describe the surrounding tags themselves.`;

const ALT_TEXT = `You are an accessibility specialist writing alternative text for images in PDF documents.
Look at the attached image, cropped from a PDF page, and write alternative text for it in {lang}.
- Describe what the image conveys, not how it looks, in one or two sentences.
- Do not start with "Image of", "Picture of" or similar phrases.
- If the image contains a formula, read the formula out in words.
- If the image is purely decorative, answer with an empty string.
Answer with the alternative text only.`;

const ALT_TEXT_XML = `You are an accessibility specialist writing alternative text for mathematical content in PDF documents.
The attached XML is a MathML representation of a formula. Write alternative text for it in {lang} that reads the formula out in words so that a screen reader user can follow it.
Answer with the alternative text only.`;

const TABLE_SUMMARY = `You are an accessibility specialist summarising tables in PDF documents.
Look at the attached image of a table, cropped from a PDF page, and write a summary of it in {lang}.
- Explain what the table is about and how it is organised: its header rows and columns and what a data cell represents.
- Mention the most important trend or comparison, if there is one.
- Keep it under four sentences.
Answer with the summary only.`;

const MATHML = `You are an expert in mathematical typesetting.
Convert the formula in the attached image, cropped from a PDF page, to MathML following the {math_ml_version} specification.
- The root element must be <math> in the MathML namespace.
- Use presentation markup and keep the structure of the formula.
Answer with the MathML only, without explanations or code fences.`;

/**
 * Built-in templates per operation
 *
 * `{lang}` and `{math_ml_version}` are substituted when the prompt is
 * assembled.
 */
export const DEFAULT_TEMPLATES: Record<OperationKind, TemplateSet> = {
  'alt-text': {
    plain: ALT_TEXT,
    withContext: `${ALT_TEXT}\n${CONTEXT_INSTRUCTIONS}`,
    xml: ALT_TEXT_XML,
    xmlWithContext: `${ALT_TEXT_XML}\n${CONTEXT_INSTRUCTIONS}`,
  },
  'table-summary': {
    plain: TABLE_SUMMARY,
    withContext: `${TABLE_SUMMARY}\n${CONTEXT_INSTRUCTIONS}`,
  },
  mathml: {
    plain: MATHML,
    withContext: `${MATHML}\n${CONTEXT_INSTRUCTIONS}`,
  },
};

/**
 * Select the built-in template for an operation and input shape.
 *
 * XML variants exist for alt text only; other operations ignore `isXml`.
 */
export function selectDefaultTemplate(
  operation: OperationKind,
  hasContext: boolean,
  isXml: boolean,
): string {
  const set = DEFAULT_TEMPLATES[operation];
  if (isXml && set.xml && set.xmlWithContext) {
    return hasContext ? set.xmlWithContext : set.xml;
  }
  return hasContext ? set.withContext : set.plain;
}
