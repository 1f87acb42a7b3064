/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ISO 10303-21 file writer
 *
 * Compiles the header pseudo-entities and the user's entity forest, each
 * into its own table, and lays out the HEADER and DATA sections.
 */

import type { Entity } from '@p21kit/data';
import { createLogger } from '@p21kit/data';
import { compileEntities } from './entity-compiler.js';
import {
  buildHeaderEntities,
  formatTimeStamp,
  DEFAULT_IMPLEMENTATION_LEVEL,
  type StepHeader,
} from './header.js';

const log = createLogger('StepWriter');

/**
 * Options for StepWriter
 */
export interface StepWriterOptions {
  /** FILE_NAME.originating_system when the header leaves it out (default 'p21kit') */
  originatingSystem?: string;
  /** FILE_NAME.preprocessor_version when the header leaves it out (default 'p21kit') */
  preprocessorVersion?: string;
  /** FILE_DESCRIPTION.implementation_level when the header leaves it out */
  implementationLevel?: string;
  /** Source of the default time stamp (default: current time) */
  clock?: () => Date;
}

/**
 * Result of a write
 */
export interface StepWriteResult {
  /** STEP file content */
  content: string;
  stats: {
    /** Records in the DATA section */
    entityCount: number;
    /** Distinct entity objects folded into an existing record */
    duplicateCount: number;
    /** Root entities passed in */
    rootCount: number;
    /** Content size in UTF-8 bytes */
    fileSize: number;
  };
  /** DATA section id of each root, in input order */
  rootIds: number[];
}

export class StepWriter {
  private readonly options: Required<StepWriterOptions>;

  constructor(options: StepWriterOptions = {}) {
    this.options = {
      originatingSystem: options.originatingSystem ?? 'p21kit',
      preprocessorVersion: options.preprocessorVersion ?? 'p21kit',
      implementationLevel: options.implementationLevel ?? DEFAULT_IMPLEMENTATION_LEVEL,
      clock: options.clock ?? (() => new Date()),
    };
  }

  /** Fill unset header fields from the writer's defaults */
  resolveHeader(header: Partial<StepHeader> = {}): StepHeader {
    return {
      description: header.description ?? [],
      implementationLevel: header.implementationLevel ?? this.options.implementationLevel,
      name: header.name ?? '',
      timeStamp: header.timeStamp ?? formatTimeStamp(this.options.clock()),
      author: header.author ?? [],
      organization: header.organization ?? [],
      preprocessorVersion: header.preprocessorVersion ?? this.options.preprocessorVersion,
      originatingSystem: header.originatingSystem ?? this.options.originatingSystem,
      authorization: header.authorization ?? '',
      schemaIdentifiers: header.schemaIdentifiers ?? [],
    };
  }

  write(roots: Entity[], header: Partial<StepHeader> = {}): StepWriteResult {
    const headerTable = compileEntities(buildHeaderEntities(this.resolveHeader(header)));
    const dataTable = compileEntities(roots);

    const lines = [
      'ISO-10303-21;',
      'HEADER;',
      ...headerTable.toHeaderLines(),
      'ENDSEC;',
      'DATA;',
      ...dataTable.toDataLines(),
      'ENDSEC;',
      'END-ISO-10303-21;',
      '',
    ];
    const content = lines.join('\n');

    const stats = {
      entityCount: dataTable.count,
      duplicateCount: dataTable.duplicateCount,
      rootCount: roots.length,
      fileSize: new TextEncoder().encode(content).length,
    };
    log.info(`Wrote ${stats.entityCount} entities`, { operation: 'write', data: stats });

    return { content, stats, rootIds: [...dataTable.rootIds] };
  }
}

/**
 * Quick write function for simple use cases
 */
export function writeStepFile(
  roots: Entity[],
  header?: Partial<StepHeader>,
  options?: StepWriterOptions,
): string {
  return new StepWriter(options).write(roots, header).content;
}
