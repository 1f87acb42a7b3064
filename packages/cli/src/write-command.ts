/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * `p21kit write` - JSON entity document to STEP file
 */

import { StepWriter, type StepHeader, type StepWriteResult } from '@p21kit/export';
import { parseStepDocument } from './document.js';

/** Command-line options of `write`; each overrides the document's header */
export interface WriteCommandOptions {
  output?: string;
  name?: string;
  description?: string[];
  author?: string[];
  organization?: string[];
  schema?: string[];
  timestamp?: string;
  originatingSystem?: string;
  verbose?: boolean;
}

export function mergeHeader(
  header: Partial<StepHeader>,
  options: WriteCommandOptions,
): Partial<StepHeader> {
  return {
    ...header,
    ...(options.name !== undefined && { name: options.name }),
    ...(options.description !== undefined && { description: options.description }),
    ...(options.author !== undefined && { author: options.author }),
    ...(options.organization !== undefined && { organization: options.organization }),
    ...(options.schema !== undefined && { schemaIdentifiers: options.schema }),
    ...(options.timestamp !== undefined && { timeStamp: options.timestamp }),
    ...(options.originatingSystem !== undefined && { originatingSystem: options.originatingSystem }),
  };
}

/**
 * Convert document text to STEP. File access stays in the CLI entry point.
 */
export function runWrite(source: string, options: WriteCommandOptions = {}): StepWriteResult {
  const document = parseStepDocument(source);
  return new StepWriter().write(document.entities, mergeHeader(document.header, options));
}
