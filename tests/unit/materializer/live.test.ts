/**
 * Unit tests for the live renderer
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { getTableColumns, getTableName } from 'drizzle-orm';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { materializeModels, planModels } from '../../../src/lib/generator/index.js';
import type { PlanOptions } from '../../../src/lib/generator/types.js';
import { liveRenderer } from '../../../src/lib/materializer/live.js';
import type { MirrorModel } from '../../../src/lib/materializer/types.js';
import type { DeclaredSchema } from '../../../src/lib/source/manifest.js';
import { logger } from '../../../src/utils/logger.js';
import {
  blogManifest,
  countryManifest,
  cycleManifest,
  inheritanceManifest,
  schemaOf,
} from '../../helpers/fixtures.js';

function mirrorAll(schema: DeclaredSchema, options: PlanOptions = {}): Map<string, MirrorModel> {
  const result = materializeModels(planModels(schema, options), liveRenderer('mirror'));
  return new Map(result.rendered.map((r) => [r.model.label, r.result]));
}

function mirrorOf(models: Map<string, MirrorModel>, label: string): MirrorModel {
  const model = models.get(label);
  if (model === undefined) throw new Error(`${label} was not mirrored`);
  return model;
}

function foreignTargets(model: MirrorModel): Record<string, string> {
  const targets: Record<string, string> = {};
  for (const fk of getTableConfig(model.table).foreignKeys) {
    const reference = fk.reference();
    const [column] = reference.columns;
    if (column) {
      targets[column.name] = getTableName(reference.foreignTable);
    }
  }
  return targets;
}

describe('Live renderer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should build a table with every converted field', () => {
    const author = mirrorOf(mirrorAll(schemaOf(blogManifest())), 'blog.Author');

    expect(author.className).toBe('AuthorTable');
    expect(getTableName(author.table)).toBe('blog_author');
    expect(author.fieldNames).toEqual(['id', 'name', 'email', 'active']);
    expect(Object.keys(getTableColumns(author.table))).toEqual(['id', 'name', 'email', 'active']);
    expect(author.meta).toEqual({ table: 'blog_author', app: 'mirror', uniqueTogether: [], relations: {} });
  });

  it('should describe relations and keep many-to-many out of the columns', () => {
    const post = mirrorOf(mirrorAll(schemaOf(blogManifest())), 'blog.Post');

    expect(post.fieldNames).toEqual(['id', 'title', 'body', 'status', 'author', 'parent', 'tags']);
    expect(Object.keys(getTableColumns(post.table))).toEqual(['id', 'title', 'body', 'status', 'author', 'parent']);
    expect(post.meta.relations).toEqual({
      author: {
        kind: 'foreignKey',
        target: 'AuthorTable',
        references: 'id',
        onDelete: 'restrict',
        relatedName: 'posts',
        through: null,
      },
      parent: {
        kind: 'foreignKey',
        target: 'PostTable',
        references: 'id',
        onDelete: 'set null',
        relatedName: false,
        through: null,
      },
      tags: {
        kind: 'manyToMany',
        target: 'TagTable',
        references: 'id',
        onDelete: 'cascade',
        relatedName: 'posts',
        through: 'blog_post_tags',
      },
    });
  });

  it('should resolve foreign keys, including self references', () => {
    const post = mirrorOf(mirrorAll(schemaOf(blogManifest())), 'blog.Post');
    expect(foreignTargets(post)).toEqual({ author_id: 'blog_author', parent_id: 'blog_post' });
  });

  it('should keep composite uniqueness over converted columns', () => {
    const post = mirrorOf(mirrorAll(schemaOf(blogManifest())), 'blog.Post');
    expect(post.meta.uniqueTogether).toEqual([['author', 'title']]);

    const [constraint] = getTableConfig(post.table).uniqueConstraints;
    expect(constraint?.columns.map((c) => c.name)).toEqual(['author_id', 'title']);
  });

  it('should resolve models that point at each other', () => {
    const models = mirrorAll(schemaOf(cycleManifest()));
    const team = mirrorOf(models, 'org.Team');
    const member = mirrorOf(models, 'org.Member');

    expect(team.meta.relations.lead?.target).toBe('MemberTable');
    expect(member.meta.relations.team?.target).toBe('TeamTable');
    expect(foreignTargets(team)).toEqual({ lead_id: 'org_member' });
    expect(foreignTargets(member)).toEqual({ team_id: 'org_team' });
  });

  it('should drop relations to excluded models and warn naming them', () => {
    const warn = vi.spyOn(logger, 'warn');
    const models = mirrorAll(schemaOf(blogManifest()), { excludeModels: ['blog.Author'] });
    const post = mirrorOf(models, 'blog.Post');

    expect(models.has('blog.Author')).toBe(false);
    expect(post.fieldNames).toEqual(['id', 'title', 'body', 'status', 'parent', 'tags']);
    expect(post.meta.uniqueTogether).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      "Related model 'blog.Author' of field 'blog.Post.author' is not mirrored; dropping relation.",
    );
    expect(warn).toHaveBeenCalledWith(
      'blog.Post: dropping unique constraint (author, title); missing fields: author',
    );
  });

  it('should return nothing for a model without convertible data fields', () => {
    const schema = schemaOf({
      models: [
        {
          app: 'geo',
          name: 'Shape',
          fields: [{ name: 'outline', kind: 'PolygonField', primaryKey: true }],
        },
        {
          app: 'geo',
          name: 'Marker',
          fields: [
            { name: 'label', kind: 'CharField' },
            { name: 'shape', kind: 'ForeignKey', to: 'Shape' },
          ],
        },
      ],
    });
    const models = mirrorAll(schema);

    expect(models.has('geo.Shape')).toBe(false);
    expect(mirrorOf(models, 'geo.Marker').fieldNames).toEqual(['id', 'label']);
  });

  it('should drop a relation whose referenced field has no column', () => {
    const warn = vi.spyOn(logger, 'warn');
    const result = materializeModels(planModels(schemaOf(countryManifest())), liveRenderer('mirror'));
    const models = new Map(result.rendered.map((r) => [r.model.label, r.result]));

    expect(result.failed).toEqual([]);
    expect(mirrorOf(models, 'geo.Country').fieldNames).toEqual(['id', 'name']);
    const city = mirrorOf(models, 'geo.City');
    expect(city.fieldNames).toEqual(['id', 'name']);
    expect(city.meta.relations).toEqual({});
    expect(foreignTargets(city)).toEqual({});
    expect(warn).toHaveBeenCalledWith(
      "Referenced field 'geo.Country.code' has unsupported type 'CICharField'; dropping relation 'geo.City.country'.",
    );
  });

  it('should keep the relation once the referenced kind is mapped to a converter', () => {
    const models = mirrorAll(schemaOf(countryManifest()), { fieldKindMap: { CICharField: 'CharField' } });
    const city = mirrorOf(models, 'geo.City');

    expect(city.fieldNames).toEqual(['id', 'name', 'country']);
    expect(city.meta.relations.country?.references).toBe('code');
    expect(foreignTargets(city)).toEqual({ country_id: 'geo_country' });
    expect(getTableColumns(city.table)['country']?.getSQLType()).toBe('varchar(2)');
  });

  it('should store a key that references a parent link with the parent key type', () => {
    const warn = vi.spyOn(logger, 'warn');
    const models = mirrorAll(schemaOf(inheritanceManifest()));
    const restaurant = mirrorOf(models, 'food.Restaurant');
    const review = mirrorOf(models, 'food.Review');

    expect(restaurant.fieldNames).toEqual(['place', 'cuisine']);
    expect(foreignTargets(restaurant)).toEqual({ place_id: 'food_place' });
    expect(review.meta.relations.restaurant?.references).toBe('place');
    expect(foreignTargets(review)).toEqual({ restaurant_id: 'food_restaurant' });
    expect(getTableColumns(review.table)['restaurant']?.getSQLType()).toBe('bigint');
    expect(warn).not.toHaveBeenCalled();
  });

  it('should drop a relation through a parent link whose parent is not mirrored', () => {
    const warn = vi.spyOn(logger, 'warn');
    const models = mirrorAll(schemaOf(inheritanceManifest()), { excludeModels: ['food.Place'] });

    expect(mirrorOf(models, 'food.Restaurant').fieldNames).toEqual(['cuisine']);
    expect(mirrorOf(models, 'food.Review').fieldNames).toEqual(['id', 'score']);
    expect(warn).toHaveBeenCalledWith(
      "Referenced field 'food.Restaurant.place' points into 'food.Place', which is not mirrored; dropping relation 'food.Review.restaurant'.",
    );
  });
});
