/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * JSON entity document reader
 *
 * Input shape:
 *   {
 *     "header": { "name": "part.stp", "schemaIdentifiers": ["AUTOMOTIVE_DESIGN"] },
 *     "entities": [
 *       { "typeName": "cartesian_point", "attributes": [
 *         { "kind": "text", "value": "" },
 *         { "kind": "list", "items": [{ "kind": "real", "value": 0 }] }
 *       ] }
 *     ]
 *   }
 *
 * Referenced entities are nested in place ({ "kind": "reference", "entity": {...} });
 * repeated nested entities collapse to one record when written.
 */

import {
  type Attribute,
  type Entity,
  binary,
  bool,
  derived,
  entity,
  enumeration,
  int,
  isAttribute,
  isEntity,
  list,
  nul,
  real,
  ref,
  text,
  typed,
} from '@p21kit/data';
import type { StepHeader } from '@p21kit/export';

/** Error thrown for input that is not a valid entity document */
export class StepDocumentError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`${path}: ${message}`);
    this.name = 'StepDocumentError';
  }
}

export interface StepDocument {
  header: Partial<StepHeader>;
  entities: Entity[];
}

const INTEGER_STRING = /^-?\d+$/;

const STRING_HEADER_FIELDS = [
  'implementationLevel',
  'name',
  'timeStamp',
  'preprocessorVersion',
  'originatingSystem',
  'authorization',
] as const;

const LIST_HEADER_FIELDS = ['description', 'author', 'organization', 'schemaIdentifiers'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new StepDocumentError('expected a string', path);
  }
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== 'number') {
    throw new StepDocumentError('expected a number', path);
  }
  return value;
}

function expectStringList(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw new StepDocumentError('expected an array of strings', path);
  }
  return value.map((item, i) => expectString(item, `${path}[${i}]`));
}

function readInteger(value: unknown, path: string): number | bigint {
  if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    return BigInt(value);
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  throw new StepDocumentError('expected an integer or a decimal integer string', path);
}

export function readAttribute(value: unknown, path: string): Attribute {
  if (!isAttribute(value)) {
    throw new StepDocumentError('expected an attribute with a known "kind"', path);
  }

  switch (value.kind) {
    case 'null':
      return nul();
    case 'derived':
      return derived();
    case 'integer':
      return int(readInteger(value.value, `${path}.value`));
    case 'real':
      return real(expectNumber(value.value, `${path}.value`));
    case 'text':
      return text(expectString(value.value, `${path}.value`));
    case 'binary':
      return binary(expectString(value.value, `${path}.value`));
    case 'enumeration':
      return enumeration(expectString(value.value, `${path}.value`));
    case 'boolean':
      if (typeof value.value !== 'boolean') {
        throw new StepDocumentError('expected a boolean', `${path}.value`);
      }
      return bool(value.value);
    case 'typed':
      return typed(
        expectString(value.typeName, `${path}.typeName`),
        readAttribute(value.value, `${path}.value`),
      );
    case 'list': {
      if (!Array.isArray(value.items)) {
        throw new StepDocumentError('expected an array', `${path}.items`);
      }
      const items = value.items;
      return list(items.map((item, i) => readAttribute(item, `${path}.items[${i}]`)));
    }
    case 'reference':
      return ref(readEntity(value.entity, `${path}.entity`));
  }
}

export function readEntity(value: unknown, path: string): Entity {
  if (!isEntity(value)) {
    throw new StepDocumentError('expected an entity with "typeName" and "attributes"', path);
  }
  if (value.typeName.trim() === '') {
    throw new StepDocumentError('entity type name is empty', `${path}.typeName`);
  }
  const attributes = value.attributes.map((attribute: unknown, i: number) =>
    readAttribute(attribute, `${path}.attributes[${i}]`),
  );
  return entity(value.typeName, ...attributes);
}

export function readHeader(value: unknown, path: string): Partial<StepHeader> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new StepDocumentError('expected an object', path);
  }

  const header: Partial<StepHeader> = {};
  for (const field of STRING_HEADER_FIELDS) {
    if (value[field] !== undefined) {
      header[field] = expectString(value[field], `${path}.${field}`);
    }
  }
  for (const field of LIST_HEADER_FIELDS) {
    if (value[field] !== undefined) {
      header[field] = expectStringList(value[field], `${path}.${field}`);
    }
  }
  return header;
}

/**
 * Validate parsed JSON and build the entity forest.
 * Throws StepDocumentError naming the first offending path.
 */
export function readStepDocument(json: unknown): StepDocument {
  if (!isRecord(json)) {
    throw new StepDocumentError('expected an object', '$');
  }
  if (!Array.isArray(json.entities)) {
    throw new StepDocumentError('expected an array', '$.entities');
  }
  const entities: unknown[] = json.entities;
  return {
    header: readHeader(json.header, '$.header'),
    entities: entities.map((item, i) => readEntity(item, `$.entities[${i}]`)),
  };
}

/** Parse JSON text, reporting syntax errors as StepDocumentError */
export function parseStepDocument(source: string): StepDocument {
  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (error) {
    throw new StepDocumentError(error instanceof Error ? error.message : String(error), '$');
  }
  return readStepDocument(json);
}
