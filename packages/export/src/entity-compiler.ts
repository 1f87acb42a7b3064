/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Entity compiler - flattens an entity forest into a numbered table.
 *
 * An entity's body can only be rendered once every entity it references
 * has an id, so references are compiled first (children get lower ids
 * than the parent that first reaches them). The body text is then
 * interned: entities that render identically share one record.
 *
 * The walk keeps its own stack instead of recursing, so reference chains
 * of any depth compile. Nested lists and typed values inside a single
 * entity are still rendered recursively.
 */

import type { Attribute, Entity } from '@p21kit/data';
import { createLogger } from '@p21kit/data';
import { formatAttributes } from './attribute-formatter.js';
import { EntityTable } from './entity-table.js';
import { CircularReferenceError } from './errors.js';

const log = createLogger('Compiler');

interface Frame {
  entity: Entity;
  /** Referenced entities in rendering order */
  children: Entity[];
  /** Index of the next child to resolve */
  next: number;
}

/**
 * Collect the entities referenced by an attribute list, left to right,
 * without descending into the referenced entities themselves.
 */
export function collectReferences(attributes: Attribute[], out: Entity[] = []): Entity[] {
  for (const attribute of attributes) {
    switch (attribute.kind) {
      case 'reference':
        out.push(attribute.entity);
        break;
      case 'typed':
        collectReferences([attribute.value], out);
        break;
      case 'list':
        collectReferences(attribute.items, out);
        break;
      default:
        break;
    }
  }
  return out;
}

export class EntityCompiler {
  /** Entity objects already numbered during this compilation */
  private readonly resolved = new Map<Entity, number>();
  /** Entity objects whose references are still being compiled */
  private readonly inProgress = new Set<Entity>();

  constructor(readonly table: EntityTable = new EntityTable()) {}

  /**
   * Compile one entity (and everything it references) into the table.
   * Returns its id.
   *
   * On a throw, entities finished before the failure keep their records
   * and the compiler stays usable.
   */
  compile(entity: Entity): number {
    const known = this.resolved.get(entity);
    if (known !== undefined) return known;

    const stack: Frame[] = [this.enter(entity)];

    try {
      for (;;) {
        const frame = stack[stack.length - 1];

        if (frame.next < frame.children.length) {
          const child = frame.children[frame.next];
          if (this.resolved.has(child)) {
            frame.next++;
          } else if (this.inProgress.has(child)) {
            throw this.cycleError(stack, child);
          } else {
            stack.push(this.enter(child));
          }
          continue;
        }

        // All references numbered: render and intern
        const attributes = formatAttributes(frame.entity.attributes, ref => this.compile(ref));
        const id = this.table.intern(frame.entity.typeName, attributes);
        this.resolved.set(frame.entity, id);
        this.inProgress.delete(frame.entity);
        stack.pop();
        if (stack.length === 0) return id;
      }
    } finally {
      // Empty on success; on a throw, release the unfinished entities
      for (const frame of stack) {
        this.inProgress.delete(frame.entity);
      }
    }
  }

  private enter(entity: Entity): Frame {
    this.inProgress.add(entity);
    return { entity, children: collectReferences(entity.attributes), next: 0 };
  }

  private cycleError(stack: Frame[], reentered: Entity): CircularReferenceError {
    const start = stack.findIndex(frame => frame.entity === reentered);
    const chain = stack.slice(start).map(frame => frame.entity.typeName);
    chain.push(reentered.typeName);
    return new CircularReferenceError(chain);
  }
}

/**
 * Compile a forest of root entities into a fresh table.
 *
 * Roots are compiled in order and their ids recorded in `rootIds`.
 * Throws CircularReferenceError (or StepValueError from the formatter)
 * and returns nothing on failure.
 */
export function compileEntities(roots: Entity[]): EntityTable {
  const compiler = new EntityCompiler();
  for (const root of roots) {
    compiler.table.rootIds.push(compiler.compile(root));
  }
  log.debug(`Compiled ${roots.length} roots into ${compiler.table.count} entities`, {
    duplicates: compiler.table.duplicateCount,
  });
  return compiler.table;
}
