/**
 * Unit tests for the live converter table
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { getTableColumns, getTableName } from 'drizzle-orm';
import { getTableConfig, integer, pgTable } from 'drizzle-orm/pg-core';
import {
  FIELD_MAP,
  convertField,
  convertRelationField,
  registerField,
} from '../../../src/lib/type-mapping/columns.js';
import { currentTimestamp } from '../../../src/lib/type-mapping/semantics.js';
import type { ColumnBuilder } from '../../../src/lib/type-mapping/types.js';
import type { FieldInfo } from '../../../src/lib/introspector/types.js';
import { ChoiceEnum } from '../../../src/types/source-schema.js';
import { logger } from '../../../src/utils/logger.js';
import { fieldInfo } from '../../helpers/field-info.js';
import { blogManifest, schemaOf } from '../../helpers/fixtures.js';

function column(builder: ColumnBuilder | null) {
  if (builder === null) {
    throw new Error('field was not converted');
  }
  const columns = getTableColumns(pgTable('sample', { sample: builder }));
  return columns.sample;
}

describe('Live converters', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([
    ['AutoField', 'serial'],
    ['BigAutoField', 'bigserial'],
    ['SmallAutoField', 'smallserial'],
    ['IntegerField', 'integer'],
    ['PositiveIntegerField', 'integer'],
    ['BigIntegerField', 'bigint'],
    ['SmallIntegerField', 'smallint'],
    ['TextField', 'text'],
    ['BooleanField', 'boolean'],
    ['DateField', 'date'],
    ['DateTimeField', 'timestamp with time zone'],
    ['TimeField', 'time'],
    ['DurationField', 'interval'],
    ['FloatField', 'double precision'],
    ['BinaryField', 'bytea'],
    ['UUIDField', 'uuid'],
    ['JSONField', 'jsonb'],
    ['CharField', 'varchar(255)'],
    ['SlugField', 'varchar(50)'],
    ['EmailField', 'varchar(254)'],
    ['URLField', 'varchar(200)'],
    ['FileField', 'varchar(100)'],
    ['ImageField', 'varchar(100)'],
    ['GenericIPAddressField', 'varchar(39)'],
  ])('should map %s to %s', (kind, sqlType) => {
    expect(column(convertField(fieldInfo({ internalType: kind }))).getSQLType()).toBe(sqlType);
  });

  it('should pass precision and scale to numeric', () => {
    const info = fieldInfo({ internalType: 'DecimalField', maxDigits: 10, decimalPlaces: 2 });
    expect(column(convertField(info)).getSQLType()).toBe('numeric(10, 2)');
  });

  it('should leave numeric unbounded without precision', () => {
    expect(column(convertField(fieldInfo({ internalType: 'DecimalField' }))).getSQLType()).toBe('numeric');
    const digits = fieldInfo({ internalType: 'DecimalField', maxDigits: 12 });
    expect(column(convertField(digits)).getSQLType()).toBe('numeric(12)');
  });

  it('should use the physical column name', () => {
    const info = fieldInfo({ name: 'createdAt', column: 'created_at', internalType: 'DateTimeField' });
    expect(column(convertField(info)).name).toBe('created_at');
  });

  it('should apply primary key, nullability and uniqueness', () => {
    const pk = column(convertField(fieldInfo({ name: 'id', internalType: 'BigAutoField', primaryKey: true })));
    expect(pk.primary).toBe(true);

    const required = column(convertField(fieldInfo({ internalType: 'CharField', unique: true })));
    expect(required.notNull).toBe(true);
    expect(required.isUnique).toBe(true);

    const optional = column(convertField(fieldInfo({ internalType: 'TextField', null: true })));
    expect(optional.notNull).toBe(false);
  });

  it('should render an explicit null default', () => {
    const withNull = column(
      convertField(fieldInfo({ internalType: 'TextField', null: true, hasDefault: true, default: null })),
    );
    expect(withNull.hasDefault).toBe(true);
    expect(withNull.default).toBeNull();

    const without = column(convertField(fieldInfo({ internalType: 'TextField', null: true })));
    expect(without.hasDefault).toBe(false);
  });

  it('should render literal and factory defaults', () => {
    const active = column(convertField(fieldInfo({ internalType: 'BooleanField', hasDefault: true, default: true })));
    expect(active.default).toBe(true);

    const created = column(
      convertField(fieldInfo({ internalType: 'DateTimeField', hasDefault: true, default: currentTimestamp })),
    );
    expect(created.hasDefault).toBe(true);
    expect(created.defaultFn?.()).toBeInstanceOf(Date);
  });

  it('should route enum-backed fields to enum columns', () => {
    const status = new ChoiceEnum('Status', './enums.js', { DRAFT: 'draft', LIVE: 'live' });
    const info = fieldInfo({
      internalType: 'CharField',
      maxLength: 20,
      enumType: status,
      hasDefault: true,
      default: status.member('LIVE'),
    });
    const col = column(convertField(info));

    expect(col.getSQLType()).toBe('varchar(20)');
    expect(col.enumValues).toEqual(['draft', 'live']);
    expect(col.default).toBe('live');
  });

  it('should store integer enums as integers', () => {
    const level = new ChoiceEnum('Level', './enums.js', { LOW: 1, HIGH: 2 });
    const info = fieldInfo({ internalType: 'SmallIntegerField', enumType: level });
    expect(column(convertField(info)).getSQLType()).toBe('integer');
  });

  it('should drop unknown kinds with a warning', () => {
    const warn = vi.spyOn(logger, 'warn');
    expect(convertField(fieldInfo({ name: 'shape', internalType: 'PolygonField' }))).toBeNull();
    expect(warn).toHaveBeenCalledWith("Unsupported field type 'PolygonField' on field 'shape'. Skipping.");
  });

  it('should accept new registrations', () => {
    registerField('CounterField', (info) => integer(info.column));
    try {
      expect(column(convertField(fieldInfo({ internalType: 'CounterField' }))).getSQLType()).toBe('integer');
    } finally {
      FIELD_MAP.delete('CounterField');
    }
  });

  describe('convertRelationField', () => {
    const author = schemaOf(blogManifest()).getModel('blog.Author') ?? null;
    const authors = pgTable('blog_author', { id: integer('id').primaryKey() });

    function foreignKey(overrides: Partial<FieldInfo> = {}) {
      return fieldInfo({
        name: 'author',
        column: 'author_id',
        internalType: 'ForeignKey',
        isRelation: true,
        relatedModel: author,
        relatedFieldName: 'id',
        relatedFieldKind: 'BigAutoField',
        onDelete: 'PROTECT',
        relatedName: 'posts',
        ...overrides,
      });
    }

    it('should build a referencing column typed like its target', () => {
      const converted = convertRelationField(foreignKey(), {
        className: 'AuthorTable',
        column: () => authors.id,
      });
      if (converted === null || converted.column === null) throw new Error('not converted');

      expect(converted.descriptor).toEqual({
        kind: 'foreignKey',
        target: 'AuthorTable',
        references: 'id',
        onDelete: 'restrict',
        relatedName: 'posts',
        through: null,
      });

      const posts = pgTable('blog_post', { author: converted.column });
      const col = getTableColumns(posts).author;
      expect(col.name).toBe('author_id');
      expect(col.getSQLType()).toBe('bigint');
      expect(col.notNull).toBe(true);

      const [fk] = getTableConfig(posts).foreignKeys;
      expect(fk?.onDelete).toBe('restrict');
      expect(getTableName(fk?.reference().foreignTable ?? posts)).toBe('blog_author');
    });

    it('should make one-to-one columns unique', () => {
      const converted = convertRelationField(foreignKey({ internalType: 'OneToOneField' }), {
        className: 'AuthorTable',
        column: () => authors.id,
      });
      if (converted === null || converted.column === null) throw new Error('not converted');
      const col = getTableColumns(pgTable('profile', { author: converted.column })).author;
      expect(col.isUnique).toBe(true);
    });

    it('should keep many-to-many as a descriptor only', () => {
      const converted = convertRelationField(
        foreignKey({
          name: 'tags',
          internalType: 'ManyToManyField',
          manyToMany: true,
          throughDbTable: 'blog_post_tags',
          relatedName: '+',
        }),
        { className: 'TagTable', column: () => authors.id },
      );
      expect(converted?.column).toBeNull();
      expect(converted?.descriptor).toMatchObject({
        kind: 'manyToMany',
        through: 'blog_post_tags',
        relatedName: false,
      });
    });
  });
});
