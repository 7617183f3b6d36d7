/**
 * Tests for SKILL.md YAML frontmatter parser.
 */

import { describe, expect, it } from '@jest/globals';
import { parseFrontmatter, splitLines } from '../parser.js';

describe('splitLines', () => {
  it('drops carriage returns from CRLF text', () => {
    expect(splitLines('a\r\nb\r\n')).toEqual(['a', 'b', '']);
  });
});

describe('parseFrontmatter', () => {
  describe('valid SKILL.md content', () => {
    it('parses all known fields and reports where the body starts', () => {
      const content = `---
name: full-skill
description: A complete skill
license: MIT
metadata:
  author: Test Author
  version: 1.0.0
---

# Test Skill`;

      const result = parseFrontmatter(content);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.frontmatter.name).toBe('full-skill');
        expect(result.frontmatter.description).toBe('A complete skill');
        expect(result.frontmatter.license).toBe('MIT');
        expect(result.frontmatter.metadata?.author).toBe('Test Author');
        expect(result.frontmatter.metadata?.version).toBe('1.0.0');
        expect(result.bodyStartLine).toBe(9);
        expect(result.body).toBe('\n# Test Skill');
      }
    });

    it('keeps unknown keys', () => {
      const result = parseFrontmatter('---\nname: x\nallowed-tools: Bash Read\n---\n');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.frontmatter['allowed-tools']).toBe('Bash Read');
      }
    });

    it('treats an empty block as an empty mapping', () => {
      const result = parseFrontmatter('---\n---\n# Body');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.frontmatter).toEqual({});
        expect(result.body).toBe('# Body');
        expect(result.bodyStartLine).toBe(3);
      }
    });

    it('reads an empty value as absent', () => {
      const result = parseFrontmatter('---\nname: x\nlicense:\n---\n');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.frontmatter.license).toBeUndefined();
      }
    });

    it.each([
      ['1.10', '1.10'],
      ['1.0', '1.0'],
      ['2.50', '2.50'],
      ['2', '2'],
    ])('keeps the unquoted version %s as written', (written, expected) => {
      const result = parseFrontmatter(`---\nmetadata:\n  version: ${written}\n---\n`);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.frontmatter.metadata?.version).toBe(expected);
      }
    });

    it('keeps unquoted booleans and numbers in top-level fields as written', () => {
      const result = parseFrontmatter('---\nname: 007\nlicense: true\n---\n');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.frontmatter.name).toBe('007');
        expect(result.frontmatter.license).toBe('true');
      }
    });

    it('accepts CRLF line endings and a leading byte order mark', () => {
      const result = parseFrontmatter('\uFEFF---\r\nname: crlf\r\n---\r\nbody\r\n');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.frontmatter.name).toBe('crlf');
        expect(result.body).toBe('body\n');
        expect(result.bodyStartLine).toBe(4);
      }
    });

    it('closes the block at the first delimiter line', () => {
      const result = parseFrontmatter('---\nname: x\n---\nbody\n---\nmore');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.body).toBe('body\n---\nmore');
      }
    });
  });

  describe('invalid SKILL.md content', () => {
    it('reports a missing block', () => {
      const result = parseFrontmatter('# Just Markdown\n');
      expect(result).toEqual({
        success: false,
        code: 'MissingFrontmatter',
        error: 'SKILL.md must start with a YAML frontmatter block (---)',
        line: 1,
      });
    });

    it('requires the delimiter on the first line', () => {
      const result = parseFrontmatter('\n---\nname: x\n---\n');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.code).toBe('MissingFrontmatter');
      }
    });

    it('reports an unterminated block', () => {
      const result = parseFrontmatter('---\nname: x\ndescription: y\n');
      expect(result).toEqual({
        success: false,
        code: 'UnterminatedFrontmatter',
        error: 'Frontmatter opened on line 1 is never closed with ---',
        line: 1,
      });
    });

    it('reports duplicate keys at the repeated key', () => {
      const result = parseFrontmatter('---\nname: a\nname: b\n---\n');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.code).toBe('MalformedFrontmatter');
        expect(result.error).toContain('Map keys must be unique');
        expect(result.line).toBe(3);
      }
    });

    it('rejects a list', () => {
      const result = parseFrontmatter('---\n- a\n- b\n---\n');
      expect(result).toEqual({
        success: false,
        code: 'MalformedFrontmatter',
        error: 'Frontmatter must be a key-value mapping, got a list',
        line: 2,
      });
    });

    it('rejects a bare scalar', () => {
      const result = parseFrontmatter('---\njust text\n---\n');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBe('Frontmatter must be a key-value mapping, got string');
      }
    });

    it('rejects a non-scalar name', () => {
      const result = parseFrontmatter('---\nname:\n  - a\n---\n');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.code).toBe('MalformedFrontmatter');
        expect(result.error).toMatch(/^Invalid frontmatter field: name: /);
      }
    });
  });
});
