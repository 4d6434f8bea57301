/**
 * Resolves user input to the project.pbxproj that should be edited
 */
import * as fs from 'fs';
import * as path from 'path';
import { ProjectNotFoundError } from '../core/errors.js';
import { getWorkspaceProjects } from './workspace-parser.js';

/**
 * Where a descriptor lives
 */
export interface ProjectLocation {
  /** Path to project.pbxproj */
  pbxprojPath: string;
  /** Path to the .xcodeproj bundle */
  xcodeprojPath: string;
  /** Directory containing the .xcodeproj (SRCROOT) */
  projectDir: string;
  /** Bundle name without extension */
  projectName: string;
}

function fromXcodeproj(inputPath: string, xcodeprojPath: string): ProjectLocation {
  const pbxprojPath = path.join(xcodeprojPath, 'project.pbxproj');
  if (!fs.existsSync(pbxprojPath)) {
    throw new ProjectNotFoundError(inputPath, `${xcodeprojPath} has no project.pbxproj`);
  }
  return {
    pbxprojPath,
    xcodeprojPath,
    projectDir: path.dirname(xcodeprojPath),
    projectName: path.basename(xcodeprojPath, '.xcodeproj'),
  };
}

/**
 * Accepts a project.pbxproj file, an .xcodeproj, an .xcworkspace, or a
 * directory holding exactly one .xcodeproj (or, failing that, one .xcworkspace)
 *
 * @throws ProjectNotFoundError
 */
export function locateProject(inputPath: string): ProjectLocation {
  const resolved = path.resolve(inputPath);
  if (!fs.existsSync(resolved)) {
    throw new ProjectNotFoundError(inputPath, 'path does not exist');
  }

  const stat = fs.statSync(resolved);

  if (stat.isFile()) {
    if (path.basename(resolved) !== 'project.pbxproj') {
      throw new ProjectNotFoundError(inputPath, 'expected a project.pbxproj file');
    }
    return fromXcodeproj(inputPath, path.dirname(resolved));
  }

  if (resolved.endsWith('.xcodeproj')) {
    return fromXcodeproj(inputPath, resolved);
  }

  if (resolved.endsWith('.xcworkspace')) {
    const projects = getWorkspaceProjects(resolved);
    if (projects.length === 0) {
      throw new ProjectNotFoundError(inputPath, 'workspace references no existing .xcodeproj');
    }
    return fromXcodeproj(inputPath, projects[0]);
  }

  const entries = fs.readdirSync(resolved).filter(entry => !entry.startsWith('.')).sort();
  const projects = entries.filter(entry => entry.endsWith('.xcodeproj') && !entry.startsWith('Pods'));
  if (projects.length === 1) {
    return fromXcodeproj(inputPath, path.join(resolved, projects[0]));
  }
  if (projects.length > 1) {
    throw new ProjectNotFoundError(inputPath, `several projects found (${projects.join(', ')}); pass one explicitly`);
  }

  const workspaces = entries.filter(entry => entry.endsWith('.xcworkspace'));
  if (workspaces.length === 1) {
    return locateProject(path.join(resolved, workspaces[0]));
  }

  throw new ProjectNotFoundError(inputPath, 'no .xcodeproj or .xcworkspace in directory');
}
