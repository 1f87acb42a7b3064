/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Hash-consed table of compiled entities.
 *
 * Keyed by the full entity body text TYPENAME(attrs). Ids are dense,
 * 1..count, in first-intern order; interning a body already present
 * returns its id and appends nothing.
 */

export interface CompiledEntity {
  id: number;
  typeName: string;
  /** Rendered attributes, comma-joined, without the outer parentheses */
  attributes: string;
}

export function entityBody(typeName: string, attributes: string): string {
  return `${typeName}(${attributes})`;
}

export class EntityTable {
  private readonly ids = new Map<string, number>();
  private readonly records: CompiledEntity[] = [];
  private duplicates = 0;

  /** Id of every compiled root, in root order (repeats kept) */
  readonly rootIds: number[] = [];

  get count(): number {
    return this.records.length;
  }

  /** Number of intern calls answered by an existing record */
  get duplicateCount(): number {
    return this.duplicates;
  }

  /** Records in id order */
  get entities(): readonly CompiledEntity[] {
    return this.records;
  }

  lookup(body: string): number | undefined {
    return this.ids.get(body);
  }

  intern(typeName: string, attributes: string): number {
    const body = entityBody(typeName, attributes);
    const existing = this.ids.get(body);
    if (existing !== undefined) {
      this.duplicates++;
      return existing;
    }
    const id = this.records.length + 1;
    this.records.push({ id, typeName, attributes });
    this.ids.set(body, id);
    return id;
  }

  get(id: number): CompiledEntity | undefined {
    return this.records[id - 1];
  }

  /** DATA section lines: #id=TYPENAME(attrs); */
  toDataLines(): string[] {
    return this.records.map(r => `#${r.id}=${entityBody(r.typeName, r.attributes)};`);
  }

  /** HEADER section lines: TYPENAME(attrs); */
  toHeaderLines(): string[] {
    return this.records.map(r => `${entityBody(r.typeName, r.attributes)};`);
  }
}
