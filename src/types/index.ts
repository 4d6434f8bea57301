/**
 * TypeScript interfaces for xcsync
 */

/**
 * Object kinds (the `isa` of a pbxproj record) the engine reads or writes
 */
export enum RecordKind {
  FileReference = 'PBXFileReference',
  BuildFile = 'PBXBuildFile',
  Group = 'PBXGroup',
  SourcesBuildPhase = 'PBXSourcesBuildPhase',
  NativeTarget = 'PBXNativeTarget',
  Project = 'PBXProject',
  VariantGroup = 'PBXVariantGroup',
  VersionGroup = 'XCVersionGroup',
  ReferenceProxy = 'PBXReferenceProxy',
  /** Folder whose contents Xcode 16 adds to the project on its own */
  SynchronizedRootGroup = 'PBXFileSystemSynchronizedRootGroup',
}

/**
 * Sections that must be present for a descriptor to be editable
 */
export const REQUIRED_SECTIONS = [
  RecordKind.BuildFile,
  RecordKind.FileReference,
  RecordKind.Group,
  RecordKind.SourcesBuildPhase,
] as const;

/**
 * Record kinds that may appear as a child of a group
 */
export const GROUP_CHILD_KINDS: ReadonlySet<string> = new Set([
  RecordKind.FileReference,
  RecordKind.Group,
  RecordKind.VariantGroup,
  RecordKind.VersionGroup,
  RecordKind.ReferenceProxy,
  RecordKind.SynchronizedRootGroup,
]);

/**
 * A parsed pbxproj value: a string, a list, or a dictionary
 */
export type PbxValue = string | PbxValue[] | PbxDictionary;

export interface PbxDictionary {
  [key: string]: PbxValue;
}

/**
 * Location of a `key = ( ... );` list in the original text
 */
export interface ListAnchor {
  /** Offset of the closing `)` */
  closeOffset: number;
  /** Whitespace that precedes `)` on its own line, or null when the list is inline */
  closeIndent: string | null;
  /** Indentation used for entries of this list */
  entryIndent: string;
  /** Set when the last existing entry has no trailing comma: the offset just after it */
  unseparatedEnd?: number;
}

/**
 * One source file known to the project
 */
export interface FileReference {
  id: string;
  /** Display name: `name`, else the base name of `path` */
  name: string;
  path: string;
  /** Explicit `name` attribute, when the record has one */
  explicitName?: string;
  lastKnownFileType?: string;
  sourceTree: string;
  /** True for records created in this session */
  added: boolean;
}

/**
 * "Compile this file into the target"
 */
export interface BuildFile {
  id: string;
  /** FileReference id; absent for package product build files */
  fileRef?: string;
  /** Comment text, e.g. "Foo.swift in Sources" */
  displayName: string;
  added: boolean;
}

/**
 * A display folder in the project navigator
 */
export interface Group {
  id: string;
  name?: string;
  path?: string;
  sourceTree: string;
  children: string[];
  /** Number of children present when the descriptor was read */
  originalChildCount: number;
  /** Where new children are inserted; absent for groups created in this session */
  childrenAnchor?: ListAnchor;
  added: boolean;
}

/**
 * A PBXFileSystemSynchronizedRootGroup: every file under its folder is already
 * part of the project
 */
export interface SynchronizedGroup {
  id: string;
  path?: string;
  sourceTree: string;
}

/**
 * A PBXSourcesBuildPhase
 */
export interface BuildPhase {
  id: string;
  name: string;
  files: string[];
  originalFileCount: number;
  filesAnchor: ListAnchor;
}

/**
 * Native target, as far as the engine needs it
 */
export interface NativeTarget {
  id: string;
  name: string;
  productType: string;
  productName?: string;
  buildPhaseIds: string[];
}

/**
 * A `/* Begin X section *\/ ... /* End X section *\/` region
 */
export interface SectionSpan {
  isa: string;
  /** Offset just after the begin marker line */
  bodyStart: number;
  /** Offset of the start of the end marker line */
  endLineOffset: number;
  /** Indentation used for records in this section */
  recordIndent: string;
}

/**
 * In-memory model of a descriptor
 */
export interface DescriptorModel {
  /** Original descriptor text; never modified */
  text: string;
  /** Line terminator used by the original text */
  eol: string;
  sections: Map<string, SectionSpan>;
  /** Every object id in the descriptor with its isa */
  objects: Map<string, string>;
  fileReferences: Map<string, FileReference>;
  buildFiles: Map<string, BuildFile>;
  groups: Map<string, Group>;
  synchronizedGroups: Map<string, SynchronizedGroup>;
  buildPhases: Map<string, BuildPhase>;
  targets: NativeTarget[];
  mainGroupId?: string;
  /** Order in which records were added in this session, per section isa */
  addedOrder: Map<string, string[]>;
}

/**
 * A file discovered on disk that may need registering
 */
export interface CandidateFile {
  /** Base name, e.g. "ChatView.swift" */
  displayName: string;
  /** Path relative to the directory that contains the .xcodeproj, POSIX separators */
  relativePath: string;
}

export enum SkipReason {
  AlreadyRegistered = 'already-registered',
  UnsupportedType = 'unsupported-type',
  DuplicateCandidate = 'duplicate-candidate',
  SynchronizedFolder = 'synchronized-folder',
}

export interface SkippedCandidate {
  candidate: CandidateFile;
  reason: SkipReason;
}

/**
 * Plan operations, in the order they must be applied
 */
export type MutationOperation =
  | {
      kind: 'AddGroup';
      groupId: string;
      name: string;
      path: string;
    }
  | {
      kind: 'AddFileReference';
      fileRefId: string;
      name: string;
      path: string;
      lastKnownFileType: string;
    }
  | {
      kind: 'AddBuildFile';
      buildFileId: string;
      fileRefId: string;
      displayName: string;
    }
  | {
      kind: 'AppendGroupChild';
      groupId: string;
      childId: string;
    }
  | {
      kind: 'AppendBuildPhaseEntry';
      phaseId: string;
      buildFileId: string;
    };

export type MutationKind = MutationOperation['kind'];

/**
 * A file the plan registers
 */
export interface PlannedFile {
  candidate: CandidateFile;
  fileRefId: string;
  buildFileId: string;
  groupId: string;
  /** Navigator path of the group, e.g. "App/Features/Chat" */
  groupPath: string;
}

export interface MutationPlan {
  operations: MutationOperation[];
  files: PlannedFile[];
  skipped: SkippedCandidate[];
  /** Navigator paths of groups the plan creates */
  createdGroups: string[];
  /** The sources phase that receives new build files */
  phaseId?: string;
  targetName?: string;
}

/**
 * Produces fresh record identifiers
 */
export interface IdGenerator {
  newIdentifier(): string;
}

export enum IssueKind {
  DanglingFileRef = 'dangling-file-ref',
  DanglingGroupChild = 'dangling-group-child',
  DanglingPhaseEntry = 'dangling-phase-entry',
  DuplicateBuildFile = 'duplicate-build-file',
  DuplicateGroupEntry = 'duplicate-group-entry',
}

export interface IntegrityIssue {
  kind: IssueKind;
  /** The record holding the bad reference */
  recordId: string;
  /** The identifier that does not resolve, or the duplicated one */
  referenceId: string;
  message: string;
}

/**
 * Output format options
 */
export enum OutputFormat {
  Text = 'text',
  JSON = 'json',
}

/**
 * Options for a sync run
 */
export interface SyncOptions {
  /** .pbxproj, .xcodeproj, .xcworkspace, or a directory containing one */
  path: string;
  /** Explicit files (relative to cwd or absolute); discovery runs when omitted */
  files?: string[];
  sourceRoot?: string;
  target?: string;
  createGroups?: boolean;
  dryRun?: boolean;
  configPath?: string;
  /** Overrides the random generator (tests) */
  idGenerator?: IdGenerator;
}

/**
 * Result of a sync run
 */
export interface SyncResult {
  pbxprojPath: string;
  timestamp: Date;
  targetName?: string;
  added: Array<{ name: string; path: string; group: string }>;
  skipped: Array<{ name: string; path: string; reason: SkipReason }>;
  createdGroups: string[];
  operations: number;
  dryRun: boolean;
  written: boolean;
  duration: number;
}

/**
 * Result of an integrity check
 */
export interface VerifyResult {
  pbxprojPath: string;
  timestamp: Date;
  issues: IntegrityIssue[];
  counts: {
    fileReferences: number;
    buildFiles: number;
    groups: number;
    buildPhases: number;
  };
}
