/**
 * Mutation planner
 *
 * Decides which candidate files are missing from the descriptor and computes
 * the ordered operations that register them. Apart from identifier allocation
 * the planner is a pure function of the model and the candidate list.
 */
import * as path from 'path';
import type {
  BuildPhase,
  CandidateFile,
  DescriptorModel,
  Group,
  IdGenerator,
  MutationOperation,
  MutationPlan,
  NativeTarget,
  PlannedFile,
  SkippedCandidate,
} from '../types/index.js';
import { SkipReason } from '../types/index.js';
import { AnchorNotFoundError } from './errors.js';
import { DEFAULT_SOURCE_EXTENSIONS, sourceFileType } from './file-types.js';
import { getMainAppTarget } from '../parsers/pbxproj-parser.js';
import { groupDisplayName } from '../parsers/descriptor-reader.js';

export interface PlanOptions {
  idGenerator: IdGenerator;
  /** Native target whose sources phase receives the files; main app target when omitted */
  targetName?: string;
  /** Project name, used as a tie-breaker when picking the main target */
  projectName?: string;
  /** Create groups for folders that have none (default true) */
  createGroups?: boolean;
  extensions?: readonly string[];
}

const posix = path.posix;

/**
 * A group as the planner sees it: existing, or allocated earlier in this plan
 */
interface GroupNode {
  id: string;
  /** Folder relative to SRCROOT, or undefined when the group is not folder-relative */
  dir: string | undefined;
  /** Navigator path for reporting */
  label: string;
}

/**
 * Compute the operations that register every missing candidate
 *
 * @throws AnchorNotFoundError when there is something to add but no main group
 *   or sources build phase can be located
 */
export function planMutations(
  model: DescriptorModel,
  candidates: CandidateFile[],
  options: PlanOptions
): MutationPlan {
  const extensions = options.extensions ?? DEFAULT_SOURCE_EXTENSIONS;
  const registered = new Set<string>();
  for (const ref of model.fileReferences.values()) {
    registered.add(ref.name);
  }

  const synchronized = synchronizedFolders(model);
  const skipped: SkippedCandidate[] = [];
  const toAdd: Array<{ candidate: CandidateFile; fileType: string }> = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    const fileType = candidate.displayName ? sourceFileType(candidate.displayName, extensions) : undefined;
    if (!fileType) {
      skipped.push({ candidate, reason: SkipReason.UnsupportedType });
    } else if (registered.has(candidate.displayName)) {
      skipped.push({ candidate, reason: SkipReason.AlreadyRegistered });
    } else if (isUnderAny(posix.normalize(candidate.relativePath), synchronized)) {
      skipped.push({ candidate, reason: SkipReason.SynchronizedFolder });
    } else if (seen.has(candidate.displayName)) {
      skipped.push({ candidate, reason: SkipReason.DuplicateCandidate });
    } else {
      seen.add(candidate.displayName);
      toAdd.push({ candidate, fileType });
    }
  }

  if (toAdd.length === 0) {
    return { operations: [], files: [], skipped, createdGroups: [] };
  }

  const { phase, target } = resolveSourcesPhase(model, options.targetName, options.projectName);
  const mainGroup = resolveMainGroup(model);

  const resolver = new GroupResolver(model, mainGroup, options.idGenerator, options.createGroups ?? true);
  const operations: MutationOperation[] = [];
  const files: PlannedFile[] = [];

  for (const { candidate, fileType } of toAdd) {
    const relativePath = posix.normalize(candidate.relativePath);
    const { node, operations: groupOps } = resolver.resolve(posix.dirname(relativePath));
    operations.push(...groupOps);

    const fileRefId = options.idGenerator.newIdentifier();
    const buildFileId = options.idGenerator.newIdentifier();
    const refPath = node.dir !== undefined ? posix.relative(node.dir, relativePath) : candidate.displayName;

    operations.push(
      {
        kind: 'AddFileReference',
        fileRefId,
        name: candidate.displayName,
        path: refPath,
        lastKnownFileType: fileType,
      },
      {
        kind: 'AddBuildFile',
        buildFileId,
        fileRefId,
        displayName: `${candidate.displayName} in ${phase.name}`,
      },
      { kind: 'AppendGroupChild', groupId: node.id, childId: fileRefId },
      { kind: 'AppendBuildPhaseEntry', phaseId: phase.id, buildFileId }
    );

    files.push({ candidate, fileRefId, buildFileId, groupId: node.id, groupPath: node.label });
  }

  return {
    operations,
    files,
    skipped,
    createdGroups: resolver.createdLabels,
    phaseId: phase.id,
    targetName: target?.name,
  };
}

/**
 * Locate the sources build phase that receives new build files
 */
export function resolveSourcesPhase(
  model: DescriptorModel,
  targetName?: string,
  projectName?: string
): { phase: BuildPhase; target?: NativeTarget } {
  let target: NativeTarget | undefined;

  if (targetName) {
    target = model.targets.find(t => t.name === targetName);
    if (!target) {
      const available = model.targets.map(t => t.name);
      throw new AnchorNotFoundError(
        `target "${targetName}"`,
        available.length > 0 ? `available targets: ${available.join(', ')}` : 'the descriptor has no native targets'
      );
    }
  } else {
    target = getMainAppTarget(model.targets, projectName);
  }

  if (target) {
    const phase = target.buildPhaseIds
      .map(id => model.buildPhases.get(id))
      .find((p): p is BuildPhase => p !== undefined);
    if (!phase) {
      throw new AnchorNotFoundError(`sources build phase of target "${target.name}"`);
    }
    return { phase, target };
  }

  const phases = [...model.buildPhases.values()];
  if (phases.length === 1) {
    return { phase: phases[0] };
  }
  throw new AnchorNotFoundError(
    'sources build phase',
    `${phases.length} sources phases and no native target to choose between them`
  );
}

/**
 * The project's main group, or the only group nobody else contains
 */
export function resolveMainGroup(model: DescriptorModel): Group {
  if (model.mainGroupId) {
    const group = model.groups.get(model.mainGroupId);
    if (group) return group;
    throw new AnchorNotFoundError('main group', `${model.mainGroupId} is not a PBXGroup`);
  }

  const contained = new Set<string>();
  for (const group of model.groups.values()) {
    for (const child of group.children) contained.add(child);
  }
  const roots = [...model.groups.values()].filter(g => !contained.has(g.id));
  if (roots.length === 1) {
    return roots[0];
  }
  throw new AnchorNotFoundError('main group', `found ${roots.length} top-level groups and no PBXProject.mainGroup`);
}

/**
 * Folders (relative to SRCROOT) of the synchronized root groups reachable from
 * a top-level group. Xcode compiles what is inside them without any records.
 */
function synchronizedFolders(model: DescriptorModel): string[] {
  if (model.synchronizedGroups.size === 0) return [];

  const contained = new Set<string>();
  for (const group of model.groups.values()) {
    for (const child of group.children) contained.add(child);
  }

  const folders: string[] = [];
  const visited = new Set<string>();
  const visit = (group: Group, dir: string | undefined): void => {
    if (visited.has(group.id)) return;
    visited.add(group.id);
    for (const childId of group.children) {
      const synced = model.synchronizedGroups.get(childId);
      const child = model.groups.get(childId);
      if (synced) {
        const folder = childDir(synced, dir);
        if (folder !== undefined) folders.push(folder);
      } else if (child) {
        visit(child, childDir(child, dir));
      }
    }
  };

  for (const group of model.groups.values()) {
    if (!contained.has(group.id)) visit(group, childDir(group, ''));
  }
  return folders;
}

function isUnderAny(relativePath: string, folders: string[]): boolean {
  return folders.some(folder => folder === '' || relativePath.startsWith(`${folder}/`));
}

/**
 * Maps folders to groups, allocating new groups when allowed. New groups are
 * remembered so later candidates in the same folder reuse them.
 */
class GroupResolver {
  readonly createdLabels: string[] = [];
  private readonly parents = new Map<string, string>();
  private readonly dirs = new Map<string, string | undefined>();
  private readonly planned = new Map<string, GroupNode[]>();
  private readonly root: GroupNode;

  constructor(
    private readonly model: DescriptorModel,
    mainGroup: Group,
    private readonly ids: IdGenerator,
    private readonly createGroups: boolean
  ) {
    for (const group of model.groups.values()) {
      for (const child of group.children) {
        if (!this.parents.has(child)) this.parents.set(child, group.id);
      }
    }
    this.root = {
      id: mainGroup.id,
      dir: mainGroup.sourceTree === '<group>' || mainGroup.sourceTree === 'SOURCE_ROOT'
        ? normalizeDir(mainGroup.path ?? '')
        : undefined,
      label: groupDisplayName(mainGroup),
    };
  }

  resolve(targetDir: string): { node: GroupNode; operations: MutationOperation[] } {
    const located = this.locate(targetDir);
    this.assertAppendable(located.node);
    return located;
  }

  private locate(targetDir: string): { node: GroupNode; operations: MutationOperation[] } {
    const wanted = normalizeDir(targetDir);
    const operations: MutationOperation[] = [];
    let current = this.root;

    if (this.root.dir === undefined) {
      return { node: this.findByFolderName(wanted) ?? current, operations };
    }
    const remainder = this.root.dir === '' ? wanted : posix.relative(this.root.dir, wanted);
    if (remainder.startsWith('..')) {
      return { node: this.findByFolderName(wanted) ?? current, operations };
    }

    const segments = remainder === '' ? [] : remainder.split('/');
    let consumed = this.root.dir;
    let index = 0;

    while (index < segments.length) {
      const segment = segments[index];
      const next = this.findChild(current, consumed, wanted, segment);

      if (next) {
        if (next.dir !== undefined && next.dir !== current.dir) {
          consumed = next.dir;
          index = countSegments(this.root.dir, next.dir);
        } else {
          consumed = joinDir(consumed, segment);
          index++;
        }
        current = next;
        continue;
      }

      if (!this.createGroups || current.dir === undefined) {
        return { node: this.findByFolderName(wanted) ?? current, operations };
      }

      this.assertAppendable(current);
      const folder = joinDir(consumed, segment);
      const created: GroupNode = {
        id: this.ids.newIdentifier(),
        dir: folder,
        label: current.label ? `${current.label}/${segment}` : segment,
      };
      operations.push(
        {
          kind: 'AddGroup',
          groupId: created.id,
          name: segment,
          path: current.dir === '' ? folder : posix.relative(current.dir, folder),
        },
        { kind: 'AppendGroupChild', groupId: current.id, childId: created.id }
      );
      const siblings = this.planned.get(current.id) ?? [];
      siblings.push(created);
      this.planned.set(current.id, siblings);
      this.createdLabels.push(created.label);

      consumed = folder;
      index++;
      current = created;
    }

    return { node: current, operations };
  }

  /**
   * A child group of `parent` that leads towards `wanted`: one whose folder is
   * deeper than `consumed` and contains `wanted`, else a folderless group named
   * like the next segment
   */
  private findChild(parent: GroupNode, consumed: string, wanted: string, segment: string): GroupNode | undefined {
    const existing = this.model.groups.get(parent.id);
    const children = existing
      ? existing.children
          .map(id => this.model.groups.get(id))
          .filter((g): g is Group => g !== undefined)
          .map(g => ({ node: this.nodeFor(g, parent), folderless: g.path === undefined, name: groupDisplayName(g) }))
      : [];
    const planned = (this.planned.get(parent.id) ?? []).map(node => ({ node, folderless: false, name: '' }));
    const all = [...children, ...planned];

    const byFolder = all.find(({ node }) =>
      node.dir !== undefined &&
      node.dir !== parent.dir &&
      isWithin(node.dir, consumed) &&
      (wanted === node.dir || wanted.startsWith(`${node.dir}/`))
    );
    if (byFolder) return byFolder.node;

    return all.find(({ folderless, name }) => folderless && name === segment)?.node;
  }

  /**
   * An existing group anywhere in the tree named like the folder's last segment
   */
  private findByFolderName(wanted: string): GroupNode | undefined {
    const folderName = posix.basename(wanted);
    if (!folderName || folderName === '.') return undefined;
    for (const group of this.model.groups.values()) {
      if (!group.childrenAnchor) continue;
      if (groupDisplayName(group) === folderName || (group.path && posix.basename(group.path) === folderName)) {
        return { id: group.id, dir: this.dirOf(group.id), label: this.labelOf(group.id) };
      }
    }
    return undefined;
  }

  /**
   * Existing groups take new children only through their `children` list
   */
  private assertAppendable(node: GroupNode): void {
    const group = this.model.groups.get(node.id);
    if (group && !group.childrenAnchor) {
      throw new AnchorNotFoundError(`children list of group "${node.label}"`, `${node.id} has no children attribute`);
    }
  }

  private nodeFor(group: Group, parent: GroupNode): GroupNode {
    const name = groupDisplayName(group);
    return {
      id: group.id,
      dir: childDir(group, parent.dir),
      label: parent.label ? `${parent.label}/${name}` : name,
    };
  }

  /**
   * Folder of an existing group, following its ancestors up to the main group
   */
  private dirOf(groupId: string): string | undefined {
    if (this.dirs.has(groupId)) return this.dirs.get(groupId);
    let dir: string | undefined;
    if (groupId === this.root.id) {
      dir = this.root.dir;
    } else {
      const group = this.model.groups.get(groupId);
      const parentId = this.parents.get(groupId);
      if (group && parentId) {
        dir = childDir(group, this.dirOf(parentId));
      } else if (group && group.sourceTree === 'SOURCE_ROOT') {
        dir = normalizeDir(group.path ?? '');
      }
    }
    this.dirs.set(groupId, dir);
    return dir;
  }

  private labelOf(groupId: string): string {
    const names: string[] = [];
    let id: string | undefined = groupId;
    while (id && id !== this.root.id) {
      const group = this.model.groups.get(id);
      if (!group) break;
      names.unshift(groupDisplayName(group));
      id = this.parents.get(id);
    }
    if (this.root.label) names.unshift(this.root.label);
    return names.join('/');
  }
}

function childDir(group: Pick<Group, 'path' | 'sourceTree'>, parentDir: string | undefined): string | undefined {
  switch (group.sourceTree) {
    case '<group>':
      if (parentDir === undefined) return undefined;
      return normalizeDir(group.path ? posix.join(parentDir, group.path) : parentDir);
    case 'SOURCE_ROOT':
      return normalizeDir(group.path ?? '');
    default:
      return undefined;
  }
}

function countSegments(base: string, dir: string): number {
  const below = base === '' ? dir : dir.slice(base.length + 1);
  return below.split('/').length;
}

function joinDir(base: string, segment: string): string {
  return base === '' ? segment : `${base}/${segment}`;
}

/**
 * True when `dir` is strictly below `base`
 */
function isWithin(dir: string, base: string): boolean {
  return base === '' ? dir !== '' : dir.startsWith(`${base}/`);
}

function normalizeDir(dir: string): string {
  const normalized = posix.normalize(dir);
  if (normalized === '.' || normalized === '/') return '';
  return normalized.replace(/\/+$/, '');
}
