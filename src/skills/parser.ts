/**
 * YAML frontmatter parser for SKILL.md files.
 * Extracts the header block and body from a markdown document.
 */

import { parseDocument, visit, YAMLError } from 'yaml';
import type { FrontmatterParseResult } from './types.js';
import { validateFrontmatter } from './manifest.js';

const DELIMITER = '---';
const BOM = '\uFEFF';

/**
 * Split text into lines, dropping a trailing \r from each.
 */
export function splitLines(text: string): string[] {
  return text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Parse the frontmatter block at the top of a SKILL.md document.
 *
 * The block must open on the first line with a line that is exactly `---` and
 * close with the next such line. The enclosed text must be a YAML mapping
 * without duplicate keys; unknown keys are kept.
 *
 * @param content - Raw SKILL.md file content
 */
export function parseFrontmatter(content: string): FrontmatterParseResult {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const lines = splitLines(text);

  if (lines[0] !== DELIMITER) {
    return {
      success: false,
      code: 'MissingFrontmatter',
      error: 'SKILL.md must start with a YAML frontmatter block (---)',
      line: 1,
    };
  }

  const closingIndex = lines.indexOf(DELIMITER, 1);
  if (closingIndex === -1) {
    return {
      success: false,
      code: 'UnterminatedFrontmatter',
      error: 'Frontmatter opened on line 1 is never closed with ---',
      line: 1,
    };
  }

  const yamlText = lines.slice(1, closingIndex).join('\n');

  let data: unknown;
  try {
    data = readYamlBlock(yamlText);
  } catch (e) {
    if (e instanceof YAMLError) {
      // Line numbers in the error are relative to the block; the block starts on line 2
      const blockLine = e.linePos?.[0].line;
      return {
        success: false,
        code: 'MalformedFrontmatter',
        error: `Invalid YAML in frontmatter: ${firstLine(e.message)}`,
        line: blockLine !== undefined ? blockLine + 1 : undefined,
      };
    }
    const message = e instanceof Error ? firstLine(e.message) : 'Invalid YAML syntax';
    return {
      success: false,
      code: 'MalformedFrontmatter',
      error: `Invalid YAML in frontmatter: ${message}`,
    };
  }

  // An empty block is an empty mapping
  if (data === null || data === undefined) {
    data = {};
  }

  if (typeof data !== 'object' || Array.isArray(data)) {
    return {
      success: false,
      code: 'MalformedFrontmatter',
      error: `Frontmatter must be a key-value mapping, got ${Array.isArray(data) ? 'a list' : typeof data}`,
      line: 2,
    };
  }

  const validation = validateFrontmatter(data);
  if (!validation.success) {
    return {
      success: false,
      code: 'MalformedFrontmatter',
      error: `Invalid frontmatter field: ${validation.errors.join('; ')}`,
    };
  }

  return {
    success: true,
    frontmatter: validation.data,
    body: lines.slice(closingIndex + 1).join('\n'),
    bodyStartLine: closingIndex + 2,
  };
}

/**
 * Parse the YAML block, keeping numbers and booleans as written
 * (`version: 1.10` stays "1.10"). Throws the first parse error.
 */
function readYamlBlock(yamlText: string): unknown {
  const doc = parseDocument(yamlText, { uniqueKeys: true });
  const [error] = doc.errors;
  if (error !== undefined) {
    throw error;
  }

  visit(doc, {
    Scalar(_key, node) {
      if (
        (typeof node.value === 'number' || typeof node.value === 'boolean') &&
        node.source !== undefined
      ) {
        node.value = node.source;
      }
    },
  });

  const data: unknown = doc.toJS();
  return data;
}

function firstLine(message: string): string {
  return message.split('\n')[0]?.trim() ?? message;
}
