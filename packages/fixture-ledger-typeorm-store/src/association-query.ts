import { type Criteria, isPlainObject } from '@fixture-ledger/core';
import type { EntityMetadata, ObjectLiteral, SelectQueryBuilder } from 'typeorm';

type ColumnMetadata = NonNullable<ReturnType<EntityMetadata['findColumnWithPropertyPath']>>;
type RelationMetadata = NonNullable<ReturnType<EntityMetadata['findRelationWithPropertyPath']>>;

/**
 * Adds joins and conditions for `criteria` to a select query rooted at `alias`.
 *
 * Criteria under a relation property are matched against the related entity:
 * a plain object joins the relation and recurses into it, an instance of the
 * related entity joins it and matches its identifier. The same holds for a join
 * column mapped as its own property, as in identifiers that include a relation.
 * Any other value is compared with the column (or the relation's join column)
 * directly, after the driver converted it the way it converts persisted values.
 */
export function buildAssociationQuery<Entity extends ObjectLiteral>(
  qb: SelectQueryBuilder<Entity>,
  metadata: EntityMetadata,
  alias: string,
  criteria: Criteria,
): SelectQueryBuilder<Entity> {
  for (const [property, value] of Object.entries(criteria)) {
    const parameterName = `${alias}_${property}`.replace(/\./g, '');
    const column = metadata.findColumnWithPropertyPath(property);
    const relation = metadata.findRelationWithPropertyPath(property) ?? column?.relationMetadata;
    const relatedCriteria = relation ? toRelatedCriteria(relation, value) : undefined;

    if (relation && relatedCriteria) {
      qb.innerJoin(`${alias}.${relation.propertyPath}`, parameterName);
      buildAssociationQuery(qb, relation.inverseEntityMetadata, parameterName, relatedCriteria);
      continue;
    }

    if (value === null) {
      qb.andWhere(`${alias}.${property} IS NULL`);
      continue;
    }

    qb.andWhere(`${alias}.${property} = :${parameterName}`, {
      [parameterName]: toDatabaseValue(metadata, column, value),
    });
  }

  return qb;
}

function toRelatedCriteria(relation: RelationMetadata, value: unknown): Criteria | undefined {
  if (isPlainObject(value)) {
    return value;
  }

  const { target } = relation.inverseEntityMetadata;

  if (typeof target === 'function' && value instanceof target) {
    return relation.inverseEntityMetadata.getEntityIdMap(value);
  }

  return undefined;
}

/** Applies the column's transformers and the driver's conversion for its type (json, booleans, dates). */
function toDatabaseValue(metadata: EntityMetadata, column: ColumnMetadata | undefined, value: unknown): unknown {
  if (!column) {
    return value;
  }

  return metadata.connection.driver.preparePersistentValue(value, column);
}
