/**
 * Tests for source discovery and .xcsyncignore support
 */
import * as fs from 'fs';
import * as path from 'path';
import { discoverSourceFiles, parseIgnoreFile, isExcluded, toCandidate } from '../../src/core/discovery';
import { makeTempDir, writeSource } from '../helpers/project';

describe('parseIgnoreFile', () => {
  it('should skip comments and blank lines and normalize entries', () => {
    const entries = parseIgnoreFile('# generated\n\nGenerated/\n./Legacy/Old.swift\n  Mocks  \n');
    expect(entries).toEqual(['Generated', 'Legacy/Old.swift', 'Mocks']);
  });
});

describe('isExcluded', () => {
  it('should match base names and path prefixes', () => {
    expect(isExcluded('Mocks', 'App/Mocks', ['Mocks'])).toBe(true);
    expect(isExcluded('Chat', 'App/Features/Chat', ['App/Features'])).toBe(true);
    expect(isExcluded('FeaturesExtra', 'App/FeaturesExtra', ['App/Features'])).toBe(false);
  });
});

describe('toCandidate', () => {
  it('should make paths relative to the project directory with forward slashes', () => {
    const projectDir = path.join(path.sep, 'work', 'Demo');
    expect(toCandidate(path.join(projectDir, 'Demo', 'View.swift'), projectDir)).toEqual({
      displayName: 'View.swift',
      relativePath: 'Demo/View.swift',
    });
  });
});

describe('discoverSourceFiles', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should list compilable files depth first in name order', () => {
    writeSource(tempDir, 'Demo/b.swift');
    writeSource(tempDir, 'Demo/A/z.m');
    writeSource(tempDir, 'Demo/a.swift');
    writeSource(tempDir, 'Demo/notes.txt');

    expect(discoverSourceFiles(tempDir, tempDir).map(c => c.relativePath)).toEqual([
      'Demo/A/z.m',
      'Demo/a.swift',
      'Demo/b.swift',
    ]);
  });

  it('should skip hidden entries, build output and bundles', () => {
    writeSource(tempDir, 'Demo/App.swift');
    writeSource(tempDir, '.build/Cache.swift');
    writeSource(tempDir, 'Demo/.hidden.swift');
    writeSource(tempDir, 'DerivedData/Gen.swift');
    writeSource(tempDir, 'Pods/Lib/Lib.swift');
    writeSource(tempDir, 'build/Out.swift');
    writeSource(tempDir, 'Demo.xcodeproj/Stray.swift');
    writeSource(tempDir, 'Demo/Assets.xcassets/Odd.swift');

    expect(discoverSourceFiles(tempDir, tempDir).map(c => c.relativePath)).toEqual(['Demo/App.swift']);
  });

  it('should honour .xcsyncignore in the project directory', () => {
    writeSource(tempDir, 'Demo/App.swift');
    writeSource(tempDir, 'Demo/Generated/API.swift');
    writeSource(tempDir, 'Demo/Preview.swift');
    fs.writeFileSync(path.join(tempDir, '.xcsyncignore'), '# codegen\nDemo/Generated\nPreview.swift\n');

    expect(discoverSourceFiles(tempDir, tempDir).map(c => c.relativePath)).toEqual(['Demo/App.swift']);
  });

  it('should apply extra exclusions and a custom extension list', () => {
    writeSource(tempDir, 'Demo/App.swift');
    writeSource(tempDir, 'Demo/Bridge.m');
    writeSource(tempDir, 'Demo/Fixtures/Stub.swift');

    const found = discoverSourceFiles(tempDir, tempDir, { extensions: ['.swift'], exclude: ['Fixtures/'] });
    expect(found.map(c => c.relativePath)).toEqual(['Demo/App.swift']);
  });

  it('should report paths relative to the project directory when scanning a subfolder', () => {
    writeSource(tempDir, 'Sources/Feature/View.swift');

    expect(discoverSourceFiles(path.join(tempDir, 'Sources'), tempDir)).toEqual([
      { displayName: 'View.swift', relativePath: 'Sources/Feature/View.swift' },
    ]);
  });
});
