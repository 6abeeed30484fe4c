import { describe, it, expect } from 'vitest';
import path from 'path';
import { z } from 'zod';
import {
  ProjectIdSchema,
  SceneIdSchema,
  formatZodIssues,
  sanitizeForLog,
  validateFilePath,
} from '../../../src/utils/validation.js';

describe('Validation Utils', () => {
  describe('ProjectIdSchema', () => {
    it('should accept safe identifiers', () => {
      const validIds = ['doc-001', 'project_2', 'ABC'];

      validIds.forEach(id => {
        expect(ProjectIdSchema.safeParse(id).success).toBe(true);
      });
    });

    it('should reject identifiers that could escape the work directory', () => {
      const invalidIds = ['', '../etc', 'a/b', 'with space', 'x'.repeat(101)];

      invalidIds.forEach(id => {
        expect(ProjectIdSchema.safeParse(id).success).toBe(false);
      });
    });
  });

  describe('SceneIdSchema', () => {
    it('should accept non-negative integers and safe strings', () => {
      expect(SceneIdSchema.safeParse(0).success).toBe(true);
      expect(SceneIdSchema.safeParse(12).success).toBe(true);
      expect(SceneIdSchema.safeParse('intro').success).toBe(true);
    });

    it('should reject negative, fractional and path-like values', () => {
      expect(SceneIdSchema.safeParse(-1).success).toBe(false);
      expect(SceneIdSchema.safeParse(1.5).success).toBe(false);
      expect(SceneIdSchema.safeParse('../1').success).toBe(false);
    });
  });

  describe('validateFilePath', () => {
    const base = path.resolve('/tmp/docuforge');

    it('should allow paths inside the base directory', () => {
      expect(validateFilePath('/tmp/docuforge/p1/clip_1.mp4', base)).toBe(true);
      expect(validateFilePath('/tmp/docuforge', base)).toBe(true);
    });

    it('should reject traversal and sibling prefixes', () => {
      expect(validateFilePath('/tmp/docuforge/../etc/passwd', base)).toBe(false);
      expect(validateFilePath('/tmp/docuforge-other/file.wav', base)).toBe(false);
    });
  });

  describe('formatZodIssues', () => {
    it('should prefix each issue with its path', () => {
      const schema = z.object({ scenes: z.array(z.object({ sceneId: z.number() })) });
      const result = schema.safeParse({ scenes: [{ sceneId: 'a' }] });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodIssues(result.error)).toEqual(['scenes.0.sceneId: Expected number, received string']);
      }
    });

    it('should use (root) for top-level issues', () => {
      const result = z.string().safeParse(42);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodIssues(result.error)).toEqual(['(root): Expected string, received number']);
      }
    });
  });

  describe('sanitizeForLog', () => {
    it('should mask secrets', () => {
      expect(sanitizeForLog('N8N_USER_MANAGEMENT_JWT_SECRET=test-secret start')).toBe(
        'N8N_USER_MANAGEMENT_JWT_SECRET=*** start'
      );
      expect(sanitizeForLog('Authorization: Bearer abc.def')).toBe('Authorization: Bearer ***');
      expect(sanitizeForLog('url?token=xyz&password=hunter')).toBe('url?token=***&password=***');
    });
  });
});
