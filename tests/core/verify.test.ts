/**
 * Tests for referential integrity checks
 */
import { readDescriptor } from '../../src/parsers/descriptor-reader';
import { verifyDescriptor, issueKey } from '../../src/core/verify';
import { IssueKind } from '../../src/types';
import { readFixture, fixtureId, withSynchronizedFolder } from '../helpers/project';

const demo = readFixture('demo.pbxproj');

const BF1 = fixtureId('BF', 1);
const BF2 = fixtureId('BF', 2);
const FE2 = fixtureId('FE', 2);
const FE3 = fixtureId('FE', 3);
const AB2 = fixtureId('AB', 2);
const AB3 = fixtureId('AB', 3);
const PHASE = fixtureId('5C', 1);

describe('verifyDescriptor', () => {
  it('should find nothing wrong with a consistent project', () => {
    expect(verifyDescriptor(readDescriptor(demo))).toEqual([]);
  });

  it('should report build files that reference missing files', () => {
    const missing = fixtureId('FE', 9);
    const text = demo.replace(`fileRef = ${FE3} /* RootView.swift */`, `fileRef = ${missing} /* RootView.swift */`);

    expect(verifyDescriptor(readDescriptor(text))).toEqual([
      {
        kind: IssueKind.DanglingFileRef,
        recordId: BF2,
        referenceId: missing,
        message: `Build file ${BF2} (RootView.swift in Sources) references missing file ${missing}`,
      },
    ]);
  });

  it('should accept synchronized folders as group children', () => {
    const text = withSynchronizedFolder(demo, fixtureId('F5', 10), 'Feature');
    const model = readDescriptor(text);

    expect(model.groups.get(AB2)?.children).toContain(fixtureId('F5', 10));
    expect(model.synchronizedGroups.get(fixtureId('F5', 10))).toEqual({
      id: fixtureId('F5', 10),
      path: 'Feature',
      sourceTree: '<group>',
    });
    expect(verifyDescriptor(model)).toEqual([]);
  });

  it('should report group children that do not exist', () => {
    const missing = fixtureId('FE', 8);
    const text = demo.replace(`\t\t\t\t${FE2} /* Demo.app */,\n`, `\t\t\t\t${missing} /* Demo.app */,\n`);

    const [issue] = verifyDescriptor(readDescriptor(text));
    expect(issue.kind).toBe(IssueKind.DanglingGroupChild);
    expect(issue.recordId).toBe(AB3);
    expect(issue.message).toBe(`Group "Products" lists missing child ${missing}`);
  });

  it('should report group children of the wrong kind', () => {
    const text = demo.replace(`\t\t\t\t${FE2} /* Demo.app */,\n`, `\t\t\t\t${BF1} /* AppDelegate.swift in Sources */,\n`);

    const [issue] = verifyDescriptor(readDescriptor(text));
    expect(issue.message).toBe(`Group "Products" lists ${BF1}, which is a PBXBuildFile, not a file or group`);
  });

  it('should report phase entries that are not build files', () => {
    const missing = fixtureId('BF', 7);
    const text = demo.replace(`\t\t\t\t${BF2} /* RootView.swift in Sources */,\n`, `\t\t\t\t${missing} /* RootView.swift in Sources */,\n`);

    expect(verifyDescriptor(readDescriptor(text))).toEqual([
      {
        kind: IssueKind.DanglingPhaseEntry,
        recordId: PHASE,
        referenceId: missing,
        message: `Build phase "Sources" lists ${missing}, which is not a build file`,
      },
    ]);
  });

  it('should report a file compiled twice in one phase', () => {
    const extra = fixtureId('BF', 3);
    const text = demo
      .replace(
        '/* End PBXBuildFile section */',
        `\t\t${extra} /* AppDelegate.swift in Sources */ = {isa = PBXBuildFile; fileRef = ${fixtureId('FE', 1)} /* AppDelegate.swift */; };\n/* End PBXBuildFile section */`
      )
      .replace(
        `\t\t\t\t${BF2} /* RootView.swift in Sources */,\n`,
        `\t\t\t\t${BF2} /* RootView.swift in Sources */,\n\t\t\t\t${extra} /* AppDelegate.swift in Sources */,\n`
      );

    const [issue] = verifyDescriptor(readDescriptor(text));
    expect(issue.kind).toBe(IssueKind.DuplicateBuildFile);
    expect(issue.message).toBe(`Build phase "Sources" compiles "AppDelegate.swift" twice (${BF1} and ${extra})`);
  });

  it('should report two files with the same name in one group', () => {
    const text = demo.replace(
      `\t\t\t\t${fixtureId('AB', 4)} /* Views */,\n`,
      `\t\t\t\t${fixtureId('AB', 4)} /* Views */,\n\t\t\t\t${FE3} /* RootView.swift */,\n\t\t\t\t${FE3} /* RootView.swift */,\n`
    );

    const issues = verifyDescriptor(readDescriptor(text));
    expect(issues.map(i => [i.kind, i.recordId])).toEqual([[IssueKind.DuplicateGroupEntry, AB2]]);
  });
});

describe('issueKey', () => {
  it('should combine kind, record and reference', () => {
    expect(issueKey({ kind: IssueKind.DanglingFileRef, recordId: 'A', referenceId: 'B', message: 'x' }))
      .toBe('dangling-file-ref:A:B');
  });
});
