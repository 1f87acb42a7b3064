/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @p21kit/data - STEP entity data model
 */

export type {
  Attribute,
  AttributeKind,
  Entity,
  NullAttribute,
  DerivedAttribute,
  IntegerAttribute,
  RealAttribute,
  TextAttribute,
  BinaryAttribute,
  EnumerationAttribute,
  BooleanAttribute,
  TypedAttribute,
  ListAttribute,
  ReferenceAttribute,
} from './model.js';
export { ATTRIBUTE_KINDS, isAttribute, isEntity } from './model.js';
export {
  nul,
  derived,
  int,
  real,
  text,
  binary,
  enumeration,
  bool,
  typed,
  list,
  ref,
  reals,
  texts,
  entity,
} from './builders.js';
export { normalizeName } from './names.js';
export { createLogger, isDebugEnabled, DEBUG_ENV_VAR } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
