/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @p21kit/export - ISO 10303-21 writing
 */

export {
  formatAttribute,
  formatAttributes,
  formatInteger,
  formatReal,
  type ReferenceResolver,
} from './attribute-formatter.js';
export { EntityTable, entityBody, type CompiledEntity } from './entity-table.js';
export { EntityCompiler, compileEntities, collectReferences } from './entity-compiler.js';
export {
  buildHeaderEntities,
  formatTimeStamp,
  DEFAULT_IMPLEMENTATION_LEVEL,
  type StepHeader,
} from './header.js';
export {
  StepWriter,
  writeStepFile,
  type StepWriterOptions,
  type StepWriteResult,
} from './step-writer.js';
export { StepValueError, CircularReferenceError } from './errors.js';
