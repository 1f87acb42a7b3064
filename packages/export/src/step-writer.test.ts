/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { entity, nul, reals, ref, text } from '@p21kit/data';
import { StepWriter, writeStepFile } from './step-writer.js';
import { buildHeaderEntities, formatTimeStamp } from './header.js';
import { compileEntities } from './entity-compiler.js';
import { CircularReferenceError } from './errors.js';

const FIXED_DATE = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678));
const clock = () => FIXED_DATE;

describe('formatTimeStamp', () => {
  it('drops milliseconds and zone', () => {
    expect(formatTimeStamp(FIXED_DATE)).toBe('2024-01-02T03:04:05');
  });
});

describe('buildHeaderEntities', () => {
  it('maps header fields onto the three header entities', () => {
    const entities = buildHeaderEntities({
      description: ['d1', 'd2'],
      implementationLevel: '2;1',
      name: 'a.stp',
      timeStamp: '2024-01-02T03:04:05',
      author: ['Ann'],
      organization: [],
      preprocessorVersion: 'pre',
      originatingSystem: 'sys',
      authorization: 'auth',
      schemaIdentifiers: ['CONFIG_CONTROL_DESIGN'],
    });

    expect(compileEntities(entities).toHeaderLines()).toEqual([
      "FILE_DESCRIPTION(('d1','d2'),'2;1');",
      "FILE_NAME('a.stp','2024-01-02T03:04:05',('Ann'),(),'pre','sys','auth');",
      "FILE_SCHEMA(('CONFIG_CONTROL_DESIGN'));",
    ]);
  });
});

describe('StepWriter', () => {
  it('writes a complete file', () => {
    const writer = new StepWriter({ clock });
    const origin = entity('CARTESIAN_POINT', text(''), reals([0, 0, 0]));

    const result = writer.write(
      [entity('AXIS2_PLACEMENT_3D', text(''), ref(origin), nul(), nul())],
      {
        description: ['Test model'],
        name: 'part.stp',
        author: ["O'Brien"],
        organization: ['ACME'],
        schemaIdentifiers: ['AUTOMOTIVE_DESIGN'],
      },
    );

    expect(result.content).toBe(
      [
        'ISO-10303-21;',
        'HEADER;',
        "FILE_DESCRIPTION(('Test model'),'2;1');",
        "FILE_NAME('part.stp','2024-01-02T03:04:05',('O''Brien'),('ACME'),'p21kit','p21kit','');",
        "FILE_SCHEMA(('AUTOMOTIVE_DESIGN'));",
        'ENDSEC;',
        'DATA;',
        "#1=CARTESIAN_POINT('',(0.,0.,0.));",
        "#2=AXIS2_PLACEMENT_3D('',#1,$,$);",
        'ENDSEC;',
        'END-ISO-10303-21;',
        '',
      ].join('\n'),
    );
    expect(result.rootIds).toEqual([2]);
    expect(result.stats).toEqual({
      entityCount: 2,
      duplicateCount: 0,
      rootCount: 1,
      fileSize: result.content.length,
    });
  });

  it('fills header defaults from options', () => {
    const writer = new StepWriter({
      clock,
      originatingSystem: 'cad-app',
      preprocessorVersion: 'conv 1.0',
      implementationLevel: '2;2',
    });

    expect(writer.resolveHeader()).toEqual({
      description: [],
      implementationLevel: '2;2',
      name: '',
      timeStamp: '2024-01-02T03:04:05',
      author: [],
      organization: [],
      preprocessorVersion: 'conv 1.0',
      originatingSystem: 'cad-app',
      authorization: '',
      schemaIdentifiers: [],
    });
  });

  it('writes empty sections', () => {
    const content = writeStepFile([], { timeStamp: 'T' });

    expect(content).toBe(
      'ISO-10303-21;\nHEADER;\n' +
        "FILE_DESCRIPTION((),'2;1');\n" +
        "FILE_NAME('','T',(),(),'p21kit','p21kit','');\n" +
        'FILE_SCHEMA(());\n' +
        'ENDSEC;\nDATA;\nENDSEC;\nEND-ISO-10303-21;\n',
    );
  });

  it('escapes header strings like data strings', () => {
    const content = writeStepFile([], { name: 'Maße.stp', timeStamp: 'T' });
    expect(content).toContain("FILE_NAME('Ma\\X\\DFe.stp','T',");
  });

  it('writes only ASCII, so file size equals content length', () => {
    const result = new StepWriter({ clock, originatingSystem: 'ü' }).write([entity('A', text('€'))]);

    expect(result.content).toContain("'\\X\\FC'");
    expect(result.content).toContain("#1=A('\\X2\\20AC\\X0\\');");
    expect(result.stats.fileSize).toBe(result.content.length);
  });

  it('writes nothing when the data contains a cycle', () => {
    const a = entity('A', nul());
    a.attributes[0] = ref(a);
    expect(() => new StepWriter({ clock }).write([a])).toThrow(CircularReferenceError);
  });
});
