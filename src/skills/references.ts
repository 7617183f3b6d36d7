/**
 * Extracts file references from the markdown body of a SKILL.md.
 *
 * Two kinds of references are collected:
 * - inline links, images and link definitions whose target is inside references/
 * - under a "References" heading, every relative link plus explicit path
 *   mentions (inline code or bare `references/...`, `scripts/...` tokens)
 *
 * Fenced code blocks are skipped.
 */

import { posix } from 'node:path';
import type { Reference } from './types.js';
import { splitLines } from './parser.js';

const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;
const HEADING_PATTERN = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*#*[ \t]*$/;
const REFERENCES_HEADING = /^references:?$/i;

/**
 * [text](target "title") and ![alt](target). The text may hold one linked
 * image, as in [![alt](img.png)](target).
 */
const INLINE_LINK_PATTERN =
  /!?\[((?:[^[\]]|!\[[^\]]*\]\([^)]*\))*)\]\(\s*(<[^>]*>|[^)\s]+)(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\)/g;
/** An image inside link text */
const NESTED_IMAGE_PATTERN = /!\[[^\]]*\]\(\s*(<[^>]*>|[^)\s]+)[^)]*\)/g;
/** [id]: target */
const LINK_DEFINITION_PATTERN = /^ {0,3}\[[^\]]+\]:\s*(<[^>]*>|\S+)/;
const CODE_SPAN_PATTERN = /`([^`]+)`/g;
/** Bare references/... or scripts/... tokens */
const BARE_PATH_PATTERN = /(?:^|[\s(])((?:\.\/)?(?:references|scripts)\/[\w./-]*[\w-])/g;
/** The same token, anchored, for testing the contents of one code span */
const BARE_PATH_TOKEN = /^(?:\.\/)?(?:references|scripts)\/[\w./-]*[\w-]$/;
/** A relative file path with an extension, as written inside inline code */
const PATH_LIKE_PATTERN = /^(?:\.\/)?[\w.-]+(?:\/[\w.-]+)*\.[A-Za-z0-9]+$/;
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Whether a link target points outside the skill (URL, mailto, anchor).
 */
export function isExternalTarget(target: string): boolean {
  return SCHEME_PATTERN.test(target) || target.startsWith('//') || target.startsWith('#');
}

/**
 * Normalize a link target to a `/`-separated path relative to the skill directory.
 * Returns undefined for targets that name no file (pure anchors, empty paths).
 */
export function normalizeTarget(raw: string): string | undefined {
  let target = raw.trim();
  if (target.startsWith('<') && target.endsWith('>')) {
    target = target.slice(1, -1).trim();
  }
  target = target.split('#')[0] ?? '';
  target = target.split('?')[0] ?? '';
  if (target === '') return undefined;

  const normalized = posix.normalize(decodePath(target).replace(/\\/g, '/'));
  const trimmed = normalized.replace(/^(\.\/)+/, '').replace(/\/+$/, '');
  return trimmed === '' || trimmed === '.' ? undefined : trimmed;
}

/**
 * Extract references from markdown.
 *
 * @param markdown - Document body
 * @param startLine - Document line number of the first line of `markdown`
 */
export function extractReferences(markdown: string, startLine = 1): Reference[] {
  const references: Reference[] = [];
  const lines = splitLines(markdown);

  let fence: string | null = null;
  let referencesLevel: number | null = null;
  // One reference per target and line, so `[`a.md`](a.md)` is not counted twice
  const seen = new Set<string>();

  lines.forEach((line, index) => {
    const lineNumber = startLine + index;

    const fenceMatch = FENCE_PATTERN.exec(line);
    if (fence !== null) {
      if (fenceMatch?.[1] !== undefined && isClosingFence(fenceMatch[1], fence, line)) {
        fence = null;
      }
      return;
    }
    if (fenceMatch?.[1] !== undefined) {
      fence = fenceMatch[1];
      return;
    }

    const heading = HEADING_PATTERN.exec(line);
    if (heading?.[1] !== undefined) {
      const level = heading[1].length;
      const text = (heading[2] ?? '').trim();
      if (referencesLevel !== null && level <= referencesLevel) {
        referencesLevel = null;
      }
      if (REFERENCES_HEADING.test(text)) {
        referencesLevel = level;
      }
      return;
    }

    const inReferencesSection = referencesLevel !== null;
    const push = (raw: string, kind: Reference['kind']): void => {
      if (isExternalTarget(raw.replace(/^<|>$/g, ''))) return;
      const target = normalizeTarget(raw);
      if (target === undefined) return;
      if (kind === 'link' && !inReferencesSection && !isInsideReferencesDir(target)) return;
      const key = `${String(lineNumber)}:${target}`;
      if (seen.has(key)) return;
      seen.add(key);
      references.push({ raw, target, line: lineNumber, kind, inReferencesSection });
    };

    // Code spans are matched first so links written inside them are not followed
    const codeSpans = [...line.matchAll(CODE_SPAN_PATTERN)].map((match) => match[1] ?? '');
    const withoutCode = line.replace(CODE_SPAN_PATTERN, ' ');

    const definition = LINK_DEFINITION_PATTERN.exec(withoutCode);
    if (definition?.[1] !== undefined) {
      push(definition[1], 'link');
      return;
    }

    for (const match of withoutCode.matchAll(INLINE_LINK_PATTERN)) {
      for (const image of (match[1] ?? '').matchAll(NESTED_IMAGE_PATTERN)) {
        if (image[1] !== undefined) push(image[1], 'link');
      }
      if (match[2] !== undefined) push(match[2], 'link');
    }

    if (!inReferencesSection) return;

    for (const span of codeSpans) {
      const candidate = span.trim();
      if (PATH_LIKE_PATTERN.test(candidate) || BARE_PATH_TOKEN.test(candidate)) {
        push(candidate, 'mention');
      }
    }

    const withoutLinks = withoutCode.replace(INLINE_LINK_PATTERN, ' ');
    for (const match of withoutLinks.matchAll(BARE_PATH_PATTERN)) {
      if (match[1] !== undefined) push(match[1], 'mention');
    }
  });

  return references;
}

/**
 * Whether a reference target exists among a package's auxiliary files.
 * A target naming a directory resolves when any file lives under it.
 */
export function resolvesTo(target: string, auxiliaryFiles: readonly string[]): boolean {
  return auxiliaryFiles.some((file) => file === target || file.startsWith(`${target}/`));
}

/**
 * Decode percent-escapes, keeping the path as written when an escape is malformed.
 */
function decodePath(target: string): string {
  try {
    return decodeURI(target);
  } catch {
    return target;
  }
}

function isInsideReferencesDir(target: string): boolean {
  return target === 'references' || target.startsWith('references/');
}

function isClosingFence(marker: string, open: string, line: string): boolean {
  return marker[0] === open[0] && marker.length >= open.length && line.trim() === marker;
}
