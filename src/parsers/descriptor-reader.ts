/**
 * Loads project.pbxproj text into a DescriptorModel
 *
 * The model keeps the original text alongside typed records and the offsets
 * the writer needs, so untouched regions can be written back byte for byte.
 */
import * as path from 'path';
import type {
  BuildFile,
  BuildPhase,
  DescriptorModel,
  FileReference,
  Group,
  ListAnchor,
  NativeTarget,
} from '../types/index.js';
import { RecordKind, REQUIRED_SECTIONS } from '../types/index.js';
import { MalformedDescriptorError } from '../core/errors.js';
import { PbxSyntaxError, idListAttr, stringAttr } from './pbx-syntax.js';
import type { ParsedRecord } from './pbx-syntax.js';
import { findSections, indentBefore, readSectionRecords, toNativeTarget } from './pbxproj-parser.js';

/**
 * Parse descriptor text
 *
 * @throws MalformedDescriptorError when a required section is missing,
 *   unterminated, or not parseable
 */
export function readDescriptor(text: string): DescriptorModel {
  const { sections, unterminated } = findSections(text);

  const missing = REQUIRED_SECTIONS.filter(isa => !sections.has(isa) && !unterminated.includes(isa));
  if (missing.length > 0 || unterminated.length > 0) {
    const problems: string[] = [];
    if (missing.length > 0) problems.push(`missing ${missing.join(', ')}`);
    if (unterminated.length > 0) problems.push(`unterminated ${unterminated.join(', ')}`);
    throw new MalformedDescriptorError(
      `Descriptor is malformed: ${problems.join('; ')}`,
      [...missing, ...unterminated]
    );
  }

  const model: DescriptorModel = {
    text,
    eol: text.includes('\r\n') ? '\r\n' : '\n',
    sections,
    objects: new Map(),
    fileReferences: new Map(),
    buildFiles: new Map(),
    groups: new Map(),
    synchronizedGroups: new Map(),
    buildPhases: new Map(),
    targets: [],
    addedOrder: new Map(),
  };

  for (const [isa, span] of sections) {
    let records: ParsedRecord[];
    try {
      records = readSectionRecords(text, span);
    } catch (error) {
      if (error instanceof PbxSyntaxError) {
        throw new MalformedDescriptorError(`Descriptor is malformed: ${isa} section: ${error.message}`, [isa]);
      }
      throw error;
    }

    for (const record of records) {
      model.objects.set(record.id, stringAttr(record.body, 'isa') ?? isa);
      indexRecord(model, isa, record);
    }
  }

  return model;
}

function indexRecord(model: DescriptorModel, isa: string, record: ParsedRecord): void {
  switch (isa) {
    case RecordKind.FileReference:
      model.fileReferences.set(record.id, toFileReference(record));
      break;
    case RecordKind.BuildFile:
      model.buildFiles.set(record.id, toBuildFile(record));
      break;
    case RecordKind.Group:
      model.groups.set(record.id, toGroup(model.text, record));
      break;
    case RecordKind.SynchronizedRootGroup:
      model.synchronizedGroups.set(record.id, {
        id: record.id,
        path: stringAttr(record.body, 'path'),
        sourceTree: stringAttr(record.body, 'sourceTree') ?? '<group>',
      });
      break;
    case RecordKind.SourcesBuildPhase:
      model.buildPhases.set(record.id, toBuildPhase(model.text, record));
      break;
    case RecordKind.NativeTarget: {
      const target: NativeTarget | undefined = toNativeTarget(record);
      if (target) model.targets.push(target);
      break;
    }
    case RecordKind.Project: {
      const mainGroup = stringAttr(record.body, 'mainGroup');
      if (mainGroup) model.mainGroupId = mainGroup;
      break;
    }
  }
}

function toFileReference(record: ParsedRecord): FileReference {
  const filePath = stringAttr(record.body, 'path') ?? '';
  const explicitName = stringAttr(record.body, 'name');
  return {
    id: record.id,
    name: explicitName ?? (filePath ? path.posix.basename(filePath) : record.comment ?? ''),
    path: filePath,
    explicitName,
    lastKnownFileType: stringAttr(record.body, 'lastKnownFileType') ?? stringAttr(record.body, 'explicitFileType'),
    sourceTree: stringAttr(record.body, 'sourceTree') ?? '<group>',
    added: false,
  };
}

function toBuildFile(record: ParsedRecord): BuildFile {
  return {
    id: record.id,
    fileRef: stringAttr(record.body, 'fileRef'),
    displayName: record.comment ?? '',
    added: false,
  };
}

function toGroup(text: string, record: ParsedRecord): Group {
  const children = idListAttr(record.body, 'children');
  return {
    id: record.id,
    name: stringAttr(record.body, 'name'),
    path: stringAttr(record.body, 'path'),
    sourceTree: stringAttr(record.body, 'sourceTree') ?? '<group>',
    children,
    originalChildCount: children.length,
    childrenAnchor: listAnchor(text, record, 'children'),
    added: false,
  };
}

function toBuildPhase(text: string, record: ParsedRecord): BuildPhase {
  const files = idListAttr(record.body, 'files');
  const filesAnchor = listAnchor(text, record, 'files');
  if (!filesAnchor) {
    throw new MalformedDescriptorError(
      `Descriptor is malformed: build phase ${record.id} has no files list`,
      [RecordKind.SourcesBuildPhase]
    );
  }
  return {
    id: record.id,
    name: stringAttr(record.body, 'name') ?? record.comment ?? 'Sources',
    files,
    originalFileCount: files.length,
    filesAnchor,
  };
}

/**
 * Work out where and how entries are appended to a list attribute
 */
function listAnchor(text: string, record: ParsedRecord, key: string): ListAnchor | undefined {
  const closeOffset = record.listCloses[key];
  if (closeOffset === undefined) return undefined;

  const closeIndent = indentBefore(text, closeOffset);
  const firstEntry = record.listFirstEntries[key];
  const firstEntryIndent = firstEntry === undefined ? null : indentBefore(text, firstEntry);

  return {
    closeOffset,
    closeIndent,
    entryIndent: firstEntryIndent ?? (closeIndent !== null ? `${closeIndent}\t` : ''),
    unseparatedEnd: record.listUnseparated[key],
  };
}

/**
 * Display name used for membership checks and `/* comments *\/`
 */
export function groupDisplayName(group: Group): string {
  return group.name ?? group.path ?? '';
}
