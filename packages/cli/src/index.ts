/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @p21kit/cli - JSON entity documents and the `write` command
 */

export {
  readStepDocument,
  parseStepDocument,
  readEntity,
  readAttribute,
  readHeader,
  StepDocumentError,
  type StepDocument,
} from './document.js';
export { runWrite, mergeHeader, type WriteCommandOptions } from './write-command.js';
