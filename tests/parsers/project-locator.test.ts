/**
 * Tests for project-locator.ts and workspace-parser.ts
 */
import * as fs from 'fs';
import * as path from 'path';
import { locateProject } from '../../src/parsers/project-locator';
import { getWorkspaceProjects, parseWorkspaceDataString, resolveProjectRef } from '../../src/parsers/workspace-parser';
import { ProjectNotFoundError } from '../../src/core/errors';
import { makeTempDir, readFixture, writeProject } from '../helpers/project';

function writeWorkspace(root: string, name: string, locations: string[]): string {
  const workspace = path.join(root, `${name}.xcworkspace`);
  fs.mkdirSync(workspace, { recursive: true });
  const refs = locations.map(location => `   <FileRef\n      location = "${location}">\n   </FileRef>`).join('\n');
  fs.writeFileSync(
    path.join(workspace, 'contents.xcworkspacedata'),
    `<?xml version="1.0" encoding="UTF-8"?>\n<Workspace\n   version = "1.0">\n${refs}\n</Workspace>\n`
  );
  return workspace;
}

describe('parseWorkspaceDataString', () => {
  it('should extract project references and classify them', () => {
    const refs = parseWorkspaceDataString(`
<Workspace version = "1.0">
   <FileRef location = "group:Demo.xcodeproj"></FileRef>
   <FileRef location = "group:Pods/Pods.xcodeproj"></FileRef>
   <FileRef location = "group:Examples/Sample.xcodeproj"></FileRef>
   <FileRef location = "group:README.md"></FileRef>
</Workspace>`);

    expect(refs.map(r => [r.projectPath, r.isPods, r.isTestOrExample])).toEqual([
      ['Demo.xcodeproj', false, false],
      ['Pods/Pods.xcodeproj', true, false],
      ['Examples/Sample.xcodeproj', false, true],
    ]);
  });

  it('should not treat names that merely contain "test" as test projects', () => {
    const [ref] = parseWorkspaceDataString('<FileRef location="group:ContestManager/ContestManager.xcodeproj"/>');
    expect(ref.isTestOrExample).toBe(false);
  });

  it('should resolve absolute and relative locations', () => {
    const [absolute, relative] = parseWorkspaceDataString(
      '<FileRef location="absolute:/opt/App.xcodeproj"/><FileRef location="group:App/App.xcodeproj"/>'
    );
    expect(resolveProjectRef(absolute, '/work')).toBe('/opt/App.xcodeproj');
    expect(resolveProjectRef(relative, '/work')).toBe(path.resolve('/work', 'App/App.xcodeproj'));
  });
});

describe('locateProject', () => {
  let tempDir: string;
  const demo = readFixture('demo.pbxproj');

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should accept a project.pbxproj path', () => {
    const pbxprojPath = writeProject(tempDir, demo);

    expect(locateProject(pbxprojPath)).toEqual({
      pbxprojPath,
      xcodeprojPath: path.join(tempDir, 'Demo.xcodeproj'),
      projectDir: tempDir,
      projectName: 'Demo',
    });
  });

  it('should accept an .xcodeproj bundle', () => {
    const pbxprojPath = writeProject(tempDir, demo);
    expect(locateProject(path.join(tempDir, 'Demo.xcodeproj')).pbxprojPath).toBe(pbxprojPath);
  });

  it('should find the only project in a directory', () => {
    writeProject(tempDir, demo);
    expect(locateProject(tempDir).projectName).toBe('Demo');
  });

  it('should ignore a Pods project next to the app project', () => {
    writeProject(tempDir, demo);
    writeProject(tempDir, demo, 'Pods');
    expect(locateProject(tempDir).projectName).toBe('Demo');
  });

  it('should refuse to choose between several projects', () => {
    writeProject(tempDir, demo);
    writeProject(tempDir, demo, 'Other');
    expect(() => locateProject(tempDir)).toThrow('several projects found (Demo.xcodeproj, Other.xcodeproj)');
  });

  it('should pick the application project from a workspace', () => {
    writeProject(path.join(tempDir, 'Pods'), demo, 'Pods');
    writeProject(tempDir, demo);
    const workspace = writeWorkspace(tempDir, 'Demo', ['group:Pods/Pods.xcodeproj', 'group:Demo.xcodeproj']);

    expect(getWorkspaceProjects(workspace)).toEqual([
      path.join(tempDir, 'Demo.xcodeproj'),
      path.join(tempDir, 'Pods', 'Pods.xcodeproj'),
    ]);
    expect(locateProject(workspace).projectName).toBe('Demo');
  });

  it('should fall back to a workspace when the directory has no project', () => {
    const nested = path.join(tempDir, 'App');
    writeProject(nested, demo);
    writeWorkspace(tempDir, 'Demo', ['group:App/Demo.xcodeproj']);

    expect(locateProject(tempDir).projectDir).toBe(nested);
  });

  it('should explain what is missing', () => {
    expect(() => locateProject(path.join(tempDir, 'nope'))).toThrow(ProjectNotFoundError);
    expect(() => locateProject(tempDir)).toThrow(`No Xcode project found at ${tempDir}: no .xcodeproj or .xcworkspace in directory`);

    const stray = path.join(tempDir, 'notes.txt');
    fs.writeFileSync(stray, '');
    expect(() => locateProject(stray)).toThrow('expected a project.pbxproj file');

    fs.mkdirSync(path.join(tempDir, 'Empty.xcodeproj'));
    expect(() => locateProject(path.join(tempDir, 'Empty.xcodeproj'))).toThrow('has no project.pbxproj');
  });
});
