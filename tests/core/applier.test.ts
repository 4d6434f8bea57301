/**
 * Tests for the mutation applier
 */
import { readDescriptor } from '../../src/parsers/descriptor-reader';
import { applyPlan, cloneModel } from '../../src/core/applier';
import { writeDescriptor } from '../../src/core/descriptor-writer';
import { ReferentialIntegrityError } from '../../src/core/errors';
import type { MutationOperation, MutationPlan } from '../../src/types';
import { readFixture, fixtureId } from '../helpers/project';

const demo = readFixture('demo.pbxproj');

const FE1 = fixtureId('FE', 1);
const BF1 = fixtureId('BF', 1);
const AB2 = fixtureId('AB', 2);
const PHASE = fixtureId('5C', 1);
const X1 = fixtureId('AA', 1);
const X2 = fixtureId('AA', 2);

function plan(operations: MutationOperation[]): MutationPlan {
  return { operations, files: [], skipped: [], createdGroups: [] };
}

const addFile: MutationOperation[] = [
  { kind: 'AddFileReference', fileRefId: X1, name: 'New.swift', path: 'New.swift', lastKnownFileType: 'sourcecode.swift' },
  { kind: 'AddBuildFile', buildFileId: X2, fileRefId: X1, displayName: 'New.swift in Sources' },
  { kind: 'AppendGroupChild', groupId: AB2, childId: X1 },
  { kind: 'AppendBuildPhaseEntry', phaseId: PHASE, buildFileId: X2 },
];

function expectIntegrityError(operations: MutationOperation[], message: string): void {
  const model = readDescriptor(demo);
  expect(() => applyPlan(model, plan(operations))).toThrow(ReferentialIntegrityError);
  expect(() => applyPlan(model, plan(operations))).toThrow(message);
}

describe('applyPlan', () => {
  it('should add records and list entries to a copy of the model', () => {
    const model = readDescriptor(demo);
    const next = applyPlan(model, plan(addFile));

    expect(next.fileReferences.get(X1)).toEqual({
      id: X1,
      name: 'New.swift',
      path: 'New.swift',
      lastKnownFileType: 'sourcecode.swift',
      sourceTree: '<group>',
      added: true,
    });
    expect(next.buildFiles.get(X2)?.fileRef).toBe(X1);
    expect(next.groups.get(AB2)?.children).toEqual([FE1, fixtureId('AB', 4), X1]);
    expect(next.buildPhases.get(PHASE)?.files).toEqual([BF1, fixtureId('BF', 2), X2]);
    expect(next.addedOrder.get('PBXFileReference')).toEqual([X1]);
    expect(next.addedOrder.get('PBXBuildFile')).toEqual([X2]);
  });

  it('should leave the input model untouched', () => {
    const model = readDescriptor(demo);
    applyPlan(model, plan(addFile));

    expect(model.objects.size).toBe(12);
    expect(model.groups.get(AB2)?.children).toEqual([FE1, fixtureId('AB', 4)]);
    expect(model.buildPhases.get(PHASE)?.files).toHaveLength(2);
    expect(model.addedOrder.size).toBe(0);
  });

  it('should return the same model for an empty plan', () => {
    const model = readDescriptor(demo);
    expect(applyPlan(model, plan([]))).toBe(model);
  });

  it('should apply nothing when a later operation fails', () => {
    const model = readDescriptor(demo);
    const operations: MutationOperation[] = [
      ...addFile,
      { kind: 'AppendBuildPhaseEntry', phaseId: fixtureId('5C', 9), buildFileId: X2 },
    ];

    expect(() => applyPlan(model, plan(operations))).toThrow(ReferentialIntegrityError);
    expect(model.fileReferences.has(X1)).toBe(false);
    expect(writeDescriptor(model)).toBe(demo);
  });

  it('should reject identifiers that are already in use', () => {
    expectIntegrityError(
      [{ kind: 'AddFileReference', fileRefId: FE1, name: 'Dup.swift', path: 'Dup.swift', lastKnownFileType: 'sourcecode.swift' }],
      `AddFileReference: identifier ${FE1} is already in use`
    );
  });

  it('should reject build files pointing at missing file references', () => {
    expectIntegrityError(
      [{ kind: 'AddBuildFile', buildFileId: X2, fileRefId: X1, displayName: 'Ghost.swift in Sources' }],
      `AddBuildFile: file reference ${X1} does not exist`
    );
  });

  it('should reject children added to a missing group', () => {
    expectIntegrityError(
      [{ kind: 'AppendGroupChild', groupId: fixtureId('AB', 9), childId: FE1 }],
      `AppendGroupChild: group ${fixtureId('AB', 9)} does not exist`
    );
  });

  it('should reject group children that are not files or groups', () => {
    expectIntegrityError(
      [{ kind: 'AppendGroupChild', groupId: AB2, childId: BF1 }],
      `AppendGroupChild: child ${BF1} is not a file reference or group`
    );
  });

  it('should reject a child the group already has', () => {
    expectIntegrityError(
      [{ kind: 'AppendGroupChild', groupId: AB2, childId: FE1 }],
      `AppendGroupChild: group ${AB2} already contains ${FE1}`
    );
  });

  it('should reject phase entries for missing build files', () => {
    expectIntegrityError(
      [{ kind: 'AppendBuildPhaseEntry', phaseId: PHASE, buildFileId: X2 }],
      `AppendBuildPhaseEntry: build file ${X2} does not exist`
    );
  });

  it('should reject compiling the same file twice in a phase', () => {
    expectIntegrityError(
      [
        { kind: 'AddBuildFile', buildFileId: X2, fileRefId: FE1, displayName: 'AppDelegate.swift in Sources' },
        { kind: 'AppendBuildPhaseEntry', phaseId: PHASE, buildFileId: X2 },
      ],
      `AppendBuildPhaseEntry: build phase ${PHASE} already compiles ${FE1}`
    );
  });

  it('should reject plans that leave a group with two files of the same name', () => {
    expectIntegrityError(
      [
        { kind: 'AddFileReference', fileRefId: X1, name: 'AppDelegate.swift', path: 'Other/AppDelegate.swift', lastKnownFileType: 'sourcecode.swift' },
        { kind: 'AppendGroupChild', groupId: AB2, childId: X1 },
      ],
      'post-condition: Group "Demo" contains "AppDelegate.swift" more than once'
    );
  });
});

describe('cloneModel', () => {
  it('should copy lists so edits do not leak back', () => {
    const model = readDescriptor(demo);
    const copy = cloneModel(model);
    copy.groups.get(AB2)?.children.push(X1);

    expect(model.groups.get(AB2)?.children).toHaveLength(2);
    expect(copy.text).toBe(model.text);
  });
});
