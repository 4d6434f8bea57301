/**
 * Parser for Xcode workspace files
 *
 * Parses contents.xcworkspacedata to find the project whose descriptor should
 * be edited when the user points at a workspace. Projects are ranked by the
 * product type of their main target, so Pods and test projects never win.
 */
import * as fs from 'fs';
import * as path from 'path';
import {
  getMainTargetProductType,
  getProductTypePriority,
  isApplicationType,
  isTestType,
} from './pbxproj-parser.js';

/**
 * A project reference extracted from workspace data
 */
export interface WorkspaceProjectRef {
  /** The location string as it appears in the XML (e.g., "group:MyApp/MyApp.xcodeproj") */
  rawLocation: string;
  locationType: 'group' | 'absolute' | 'container' | 'self' | 'unknown';
  /** The relative or absolute path to the project */
  projectPath: string;
  /** Whether this is a Pods project (dependency, not the main app) */
  isPods: boolean;
  /** Whether this is a test/example project (by path segments) */
  isTestOrExample: boolean;
}

/**
 * Parses workspace data from a string
 *
 * The file is XML with structure:
 * ```xml
 * <Workspace version="1.0">
 *    <FileRef location="group:MyApp/MyApp.xcodeproj"/>
 *    <FileRef location="group:Pods/Pods.xcodeproj"/>
 * </Workspace>
 * ```
 */
export function parseWorkspaceDataString(content: string): WorkspaceProjectRef[] {
  const fileRefRegex = /<FileRef\s+location\s*=\s*"([^"]+)"\s*(?:\/>|>)/g;
  const refs: WorkspaceProjectRef[] = [];

  let match;
  while ((match = fileRefRegex.exec(content)) !== null) {
    const ref = parseLocationString(match[1]);
    if (ref.projectPath.endsWith('.xcodeproj')) {
      refs.push(ref);
    }
  }

  return refs;
}

function parseLocationString(rawLocation: string): WorkspaceProjectRef {
  const colonIndex = rawLocation.indexOf(':');
  const typeStr = colonIndex === -1 ? '' : rawLocation.substring(0, colonIndex);
  const projectPath = colonIndex === -1 ? rawLocation : rawLocation.substring(colonIndex + 1);

  const locationType: WorkspaceProjectRef['locationType'] =
    typeStr === 'group' || typeStr === 'absolute' || typeStr === 'container' || typeStr === 'self'
      ? typeStr
      : 'unknown';

  const isPods = projectPath.includes('Pods.xcodeproj') ||
                 projectPath.includes('/Pods/') ||
                 projectPath.startsWith('Pods/');

  // Match whole path segments so "ContestManager" is not a test project
  const segments = projectPath.toLowerCase().split('/');
  const keywords = ['test', 'tests', 'example', 'examples', 'demo', 'demos', 'sample', 'samples'];
  const isTestOrExample = segments.some(segment =>
    keywords.includes(segment) || segment.endsWith('tests.xcodeproj') || segment.endsWith('test.xcodeproj')
  );

  return { rawLocation, locationType, projectPath, isPods, isTestOrExample };
}

/**
 * Resolves a workspace project reference to an absolute path
 *
 * @param workspaceDir Directory containing the .xcworkspace
 */
export function resolveProjectRef(ref: WorkspaceProjectRef, workspaceDir: string): string {
  return ref.locationType === 'absolute'
    ? ref.projectPath
    : path.resolve(workspaceDir, ref.projectPath);
}

interface RankedProject {
  ref: WorkspaceProjectRef;
  resolved: string;
  priority: number;
  isApplication: boolean;
  isTestTarget: boolean;
}

function rankProject(ref: WorkspaceProjectRef, resolved: string): RankedProject {
  const ranked: RankedProject = { ref, resolved, priority: 0, isApplication: false, isTestTarget: false };
  const pbxprojPath = path.join(resolved, 'project.pbxproj');
  if (!fs.existsSync(pbxprojPath)) return ranked;

  const content = fs.readFileSync(pbxprojPath, 'utf-8');
  const productType = getMainTargetProductType(content, path.basename(resolved, '.xcodeproj'));
  if (productType) {
    ranked.priority = getProductTypePriority(productType);
    ranked.isApplication = isApplicationType(productType);
    ranked.isTestTarget = isTestType(productType);
  }
  return ranked;
}

/**
 * Given a workspace path, returns its existing projects, best candidate first
 *
 * Ordering:
 * 1. Not Pods
 * 2. Application targets
 * 3. Not test targets
 * 4. Product type priority
 * 5. Not a test/example path
 *
 * @param workspacePath Path to .xcworkspace directory
 * @returns Absolute paths to .xcodeproj directories
 */
export function getWorkspaceProjects(workspacePath: string): string[] {
  const dataPath = path.join(workspacePath, 'contents.xcworkspacedata');
  if (!fs.existsSync(dataPath)) {
    return [];
  }

  const workspaceDir = path.dirname(workspacePath);
  const ranked = parseWorkspaceDataString(fs.readFileSync(dataPath, 'utf-8'))
    .map(ref => ({ ref, resolved: resolveProjectRef(ref, workspaceDir) }))
    .filter(({ resolved }) => fs.existsSync(resolved))
    .map(({ ref, resolved }) => rankProject(ref, resolved));

  ranked.sort((a, b) => {
    if (a.ref.isPods !== b.ref.isPods) return a.ref.isPods ? 1 : -1;
    if (a.isApplication !== b.isApplication) return a.isApplication ? -1 : 1;
    if (a.isTestTarget !== b.isTestTarget) return a.isTestTarget ? 1 : -1;
    if (a.priority !== b.priority) return b.priority - a.priority;
    if (a.ref.isTestOrExample !== b.ref.isTestOrExample) return a.ref.isTestOrExample ? 1 : -1;
    return 0;
  });

  return ranked.map(({ resolved }) => resolved);
}
