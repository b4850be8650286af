/**
 * Unit tests for the two-pass generator
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  assignClassNames,
  materializeModels,
  pascalCase,
  planModels,
  shouldInclude,
} from '../../../src/lib/generator/index.js';
import type { ModelPlan } from '../../../src/lib/generator/types.js';
import { logger } from '../../../src/utils/logger.js';
import { blogManifest, cycleManifest, schemaOf } from '../../helpers/fixtures.js';

describe('Generator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('shouldInclude', () => {
    it('should include everything when the allow list is null', () => {
      expect(shouldInclude('blog.Post', null, null)).toBe(true);
      expect(shouldInclude('blog.Post', undefined, [])).toBe(true);
    });

    it('should include nothing when the allow list is empty', () => {
      expect(shouldInclude('blog.Post', [], null)).toBe(false);
    });

    it('should match glob patterns', () => {
      expect(shouldInclude('blog.Post', ['blog.*'], null)).toBe(true);
      expect(shouldInclude('shop.Item', ['blog.*'], null)).toBe(false);
      expect(shouldInclude('blog.Post', ['*.Post'], null)).toBe(true);
    });

    it('should let exclusion win regardless of order', () => {
      expect(shouldInclude('blog.Post', ['blog.*'], ['blog.Post'])).toBe(false);
      expect(shouldInclude('blog.Post', ['blog.Post', 'blog.*'], ['*.Post'])).toBe(false);
      expect(shouldInclude('blog.Tag', ['blog.Post', 'blog.*'], ['*.Post'])).toBe(true);
    });

    it('should give the same answer on repeated calls', () => {
      const include = ['blog.*'];
      const exclude = ['blog.Tag'];
      const first = shouldInclude('blog.Tag', include, exclude);
      expect(shouldInclude('blog.Tag', include, exclude)).toBe(first);
      expect(include).toEqual(['blog.*']);
      expect(exclude).toEqual(['blog.Tag']);
    });
  });

  describe('class names', () => {
    it('should pascal-case app labels', () => {
      expect(pascalCase('online_shop')).toBe('OnlineShop');
      expect(pascalCase('blog')).toBe('Blog');
    });

    it('should prefix object names shared between apps', () => {
      const schema = schemaOf({
        models: [
          { app: 'blog', name: 'Entry', fields: [{ name: 'title', kind: 'CharField' }] },
          { app: 'audit_log', name: 'Entry', fields: [{ name: 'action', kind: 'CharField' }] },
          { app: 'blog', name: 'Tag', fields: [{ name: 'label', kind: 'CharField' }] },
        ],
      });
      const plan = planModels(schema);
      expect(plan.models.map((m) => m.className)).toEqual([
        'BlogEntryTable',
        'AuditLogEntryTable',
        'TagTable',
      ]);
    });

    it('should not reuse a name another model already has when prefixing', () => {
      const schema = schemaOf({
        models: [
          { app: 'blog', name: 'Entry', fields: [{ name: 'title', kind: 'CharField' }] },
          { app: 'audit', name: 'Entry', fields: [{ name: 'action', kind: 'CharField' }] },
          { app: 'news', name: 'BlogEntry', fields: [{ name: 'headline', kind: 'CharField' }] },
        ],
      });
      const plan = planModels(schema);
      expect(plan.models.map((m) => m.className)).toEqual([
        'BlogEntry2Table',
        'AuditEntryTable',
        'BlogEntryTable',
      ]);
      expect(new Set(plan.classNames.values()).size).toBe(3);
    });

    it('should use the configured suffix', () => {
      const infos = planModels(schemaOf(cycleManifest())).models.map((m) => m.info);
      expect([...assignClassNames(infos, 'Row').values()]).toEqual(['TeamRow', 'MemberRow']);
    });
  });

  describe('planModels', () => {
    it('should plan every eligible model with its label', () => {
      const plan = planModels(schemaOf(blogManifest()));
      expect(plan.models.map((m) => m.label)).toEqual(['blog.Author', 'blog.Post', 'blog.Tag']);
      expect(plan.classNames.size).toBe(3);
      expect(plan.skipped).toEqual([]);
    });

    it('should record filtered and skipped models', () => {
      const schema = schemaOf({
        models: [
          { app: 'core', name: 'Base', abstract: true, fields: [{ name: 'x', kind: 'IntegerField' }] },
          { app: 'core', name: 'Thing', fields: [{ name: 'x', kind: 'IntegerField' }] },
          { app: 'core', name: 'Hidden', fields: [{ name: 'x', kind: 'IntegerField' }] },
        ],
      });
      const plan = planModels(schema, { excludeModels: ['core.Hidden'] });

      expect(plan.models.map((m) => m.label)).toEqual(['core.Thing']);
      expect(plan.skipped).toEqual([
        { label: 'core.Base', reason: "Model 'base' is abstract." },
        { label: 'core.Hidden', reason: 'filtered' },
      ]);
    });

    it('should restrict to the given app labels', () => {
      const schema = schemaOf({
        models: [
          { app: 'a', name: 'One', fields: [{ name: 'x', kind: 'IntegerField' }] },
          { app: 'b', name: 'Two', fields: [{ name: 'x', kind: 'IntegerField' }] },
        ],
      });
      expect(planModels(schema, { appLabels: ['b'] }).models.map((m) => m.label)).toEqual(['b.Two']);
    });
  });

  describe('materializeModels', () => {
    it('should render every model in one round when nothing fails', () => {
      const plan = planModels(schemaOf(cycleManifest()));
      const result = materializeModels(plan, () => (model) => model.className);

      expect(result.rendered.map((r) => r.result)).toEqual(['TeamTable', 'MemberTable']);
      expect(result.rounds).toBe(1);
      expect(result.failed).toEqual([]);
    });

    it('should remove failed models from the class-name map and render again', () => {
      const plan = planModels(schemaOf(blogManifest()));
      const warn = vi.spyOn(logger, 'warn');
      const seen: string[][] = [];

      const result = materializeModels(plan, () => (model: ModelPlan, classNames) => {
        if (model.label === 'blog.Tag') {
          throw new Error('broken');
        }
        seen.push([...classNames.values()]);
        return model.label;
      });

      expect(result.rendered.map((r) => r.result)).toEqual(['blog.Author', 'blog.Post']);
      expect(result.failed).toEqual([{ label: 'blog.Tag', reason: 'broken' }]);
      expect(result.rounds).toBe(2);
      expect(seen.at(-1)).toEqual(['AuthorTable', 'PostTable']);
      expect(result.classNames.size).toBe(2);
      expect(plan.classNames.size).toBe(3);
      expect(warn).toHaveBeenCalledWith('Failed to materialize blog.Tag: broken');
    });

    it('should treat an empty rendering as a failure', () => {
      const plan = planModels(schemaOf(cycleManifest()));
      const result = materializeModels(plan, () => (model) => (model.label === 'org.Team' ? null : 1));
      expect(result.failed).toEqual([{ label: 'org.Team', reason: 'no convertible fields' }]);
      expect(result.rendered).toHaveLength(1);
    });
  });
});
