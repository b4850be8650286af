/**
 * Shared source schemas for tests
 */

import {
  buildSourceSchema,
  parseSchemaManifest,
  type DeclaredSchema,
} from '../../src/lib/source/manifest.js';
import { planModels } from '../../src/lib/generator/index.js';
import type { ModelPlan, PlanOptions } from '../../src/lib/generator/types.js';
import type { SourceModel } from '../../src/types/source-schema.js';

export function schemaOf(manifest: unknown): DeclaredSchema {
  return buildSourceSchema(parseSchemaManifest(manifest));
}

/**
 * blog: Author, Post (enum, FK, self FK, M2M, unique together), Tag
 */
export function blogManifest() {
  return {
    enums: {
      PostStatus: {
        module: './enums.js',
        members: { DRAFT: 'draft', PUBLISHED: 'published' },
      },
    },
    models: [
      {
        app: 'blog',
        name: 'Author',
        fields: [
          { name: 'name', kind: 'CharField', maxLength: 100 },
          { name: 'email', kind: 'EmailField', unique: true },
          { name: 'active', kind: 'BooleanField', default: true },
        ],
      },
      {
        app: 'blog',
        name: 'Post',
        uniqueTogether: [['author', 'title']],
        fields: [
          { name: 'title', kind: 'CharField', maxLength: 200 },
          { name: 'body', kind: 'TextField', null: true },
          {
            name: 'status',
            kind: 'CharField',
            maxLength: 20,
            choices: { enum: 'PostStatus' },
            default: { enum: 'PostStatus', member: 'DRAFT' },
          },
          { name: 'author', kind: 'ForeignKey', to: 'Author', onDelete: 'PROTECT', relatedName: 'posts' },
          { name: 'parent', kind: 'ForeignKey', to: 'self', null: true, onDelete: 'SET_NULL', relatedName: '+' },
          { name: 'tags', kind: 'ManyToManyField', to: 'Tag', relatedName: 'posts' },
        ],
      },
      {
        app: 'blog',
        name: 'Tag',
        fields: [{ name: 'label', kind: 'SlugField', unique: true }],
      },
    ],
  };
}

/**
 * Two models pointing at each other.
 */
export function cycleManifest() {
  return {
    models: [
      {
        app: 'org',
        name: 'Team',
        fields: [
          { name: 'title', kind: 'CharField', maxLength: 80 },
          { name: 'lead', kind: 'ForeignKey', to: 'Member', null: true, onDelete: 'SET_NULL' },
        ],
      },
      {
        app: 'org',
        name: 'Member',
        fields: [
          { name: 'nickname', kind: 'CharField', maxLength: 40 },
          { name: 'team', kind: 'ForeignKey', to: 'Team', onDelete: 'CASCADE' },
        ],
      },
    ],
  };
}

/**
 * City points at Country through a field with no converter.
 */
export function countryManifest() {
  return {
    models: [
      {
        app: 'geo',
        name: 'Country',
        fields: [
          { name: 'code', kind: 'CICharField', maxLength: 2, unique: true },
          { name: 'name', kind: 'CharField', maxLength: 80 },
        ],
      },
      {
        app: 'geo',
        name: 'City',
        fields: [
          { name: 'name', kind: 'CharField', maxLength: 80 },
          { name: 'country', kind: 'ForeignKey', to: 'Country', toField: 'code', onDelete: 'CASCADE' },
        ],
      },
    ],
  };
}

/**
 * Restaurant is keyed by its link to Place; Review points at Restaurant.
 */
export function inheritanceManifest() {
  return {
    models: [
      {
        app: 'food',
        name: 'Place',
        fields: [{ name: 'name', kind: 'CharField', maxLength: 80 }],
      },
      {
        app: 'food',
        name: 'Restaurant',
        fields: [
          { name: 'place', kind: 'OneToOneField', to: 'Place', primaryKey: true, onDelete: 'CASCADE' },
          { name: 'cuisine', kind: 'CharField', maxLength: 40 },
        ],
      },
      {
        app: 'food',
        name: 'Review',
        fields: [
          { name: 'score', kind: 'SmallIntegerField' },
          { name: 'restaurant', kind: 'ForeignKey', to: 'Restaurant', onDelete: 'CASCADE' },
        ],
      },
    ],
  };
}

export function modelPlan(
  schema: DeclaredSchema,
  label: string,
  options: PlanOptions = {},
): { model: ModelPlan; classNames: Map<SourceModel, string> } {
  const plan = planModels(schema, options);
  const model = plan.models.find((m) => m.label === label);
  if (model === undefined) {
    throw new Error(`No plan for ${label}`);
  }
  return { model, classNames: plan.classNames };
}
