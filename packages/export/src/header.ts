/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * HEADER section pseudo-entities.
 *
 * FILE_DESCRIPTION, FILE_NAME and FILE_SCHEMA are ordinary entities as far
 * as writing goes: they are compiled through the same compiler, then
 * written without #id= prefixes.
 */

import { type Entity, entity, list, text, texts } from '@p21kit/data';

export const DEFAULT_IMPLEMENTATION_LEVEL = '2;1';

export interface StepHeader {
  /** FILE_DESCRIPTION.description */
  description: string[];
  /** FILE_DESCRIPTION.implementation_level */
  implementationLevel: string;
  /** FILE_NAME.name */
  name: string;
  /** FILE_NAME.time_stamp, ISO 8601 */
  timeStamp: string;
  author: string[];
  organization: string[];
  preprocessorVersion: string;
  originatingSystem: string;
  authorization: string;
  /** FILE_SCHEMA.schema_identifiers */
  schemaIdentifiers: string[];
}

/** YYYY-MM-DDThh:mm:ss in UTC */
export function formatTimeStamp(date: Date): string {
  return date.toISOString().split('.')[0];
}

export function buildHeaderEntities(header: StepHeader): Entity[] {
  return [
    entity('FILE_DESCRIPTION', texts(header.description), text(header.implementationLevel)),
    entity(
      'FILE_NAME',
      text(header.name),
      text(header.timeStamp),
      texts(header.author),
      texts(header.organization),
      text(header.preprocessorVersion),
      text(header.originatingSystem),
      text(header.authorization),
    ),
    entity('FILE_SCHEMA', list(header.schemaIdentifiers.map(text))),
  ];
}
