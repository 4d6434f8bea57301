/**
 * Tests for atomic descriptor replacement
 */
import * as fs from 'fs';
import * as path from 'path';
import { readDescriptorFile, writeDescriptorAtomic } from '../../src/core/storage';
import { makeTempDir } from '../helpers/project';

describe('writeDescriptorAtomic', () => {
  let tempDir: string;
  let target: string;

  beforeEach(() => {
    tempDir = makeTempDir();
    target = path.join(tempDir, 'project.pbxproj');
    fs.writeFileSync(target, 'old');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should replace the file and leave no temporary files behind', () => {
    expect(writeDescriptorAtomic(target, 'new')).toBe(true);
    expect(readDescriptorFile(target)).toBe('new');
    expect(fs.readdirSync(tempDir)).toEqual(['project.pbxproj']);
  });

  it('should not touch a file that already has the content', () => {
    const before = fs.statSync(target).mtimeMs;
    fs.utimesSync(target, new Date(0), new Date(0));

    expect(writeDescriptorAtomic(target, 'old')).toBe(false);
    expect(fs.statSync(target).mtimeMs).toBe(0);
    expect(before).toBeGreaterThan(0);
  });

  it('should keep the original file when the write fails', () => {
    const missingDir = path.join(tempDir, 'missing', 'project.pbxproj');

    expect(() => writeDescriptorAtomic(missingDir, 'new')).toThrow();
    expect(readDescriptorFile(target)).toBe('old');
    expect(fs.readdirSync(tempDir)).toEqual(['project.pbxproj']);
  });

  it('should create the file when it does not exist yet', () => {
    const fresh = path.join(tempDir, 'fresh.pbxproj');
    expect(writeDescriptorAtomic(fresh, 'content')).toBe(true);
    expect(readDescriptorFile(fresh)).toBe('content');
  });
});
