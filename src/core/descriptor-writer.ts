/**
 * Serializes a DescriptorModel back to project.pbxproj text
 *
 * The original text is copied unchanged; records added in this session are
 * inserted before their section's end marker, and new list entries before the
 * closing `)` of the group or build phase that received them.
 */
import type { BuildFile, DescriptorModel, FileReference, Group, ListAnchor } from '../types/index.js';
import { RecordKind } from '../types/index.js';
import { AnchorNotFoundError } from './errors.js';
import { quotePbxString } from '../parsers/pbx-syntax.js';
import { groupDisplayName } from '../parsers/descriptor-reader.js';

interface Insertion {
  offset: number;
  text: string;
}

/**
 * Render the model as descriptor text
 */
export function writeDescriptor(model: DescriptorModel): string {
  const insertions: Insertion[] = [];

  for (const group of model.groups.values()) {
    if (group.added || group.children.length <= group.originalChildCount) continue;
    if (!group.childrenAnchor) {
      throw new AnchorNotFoundError(
        `children list of group "${groupDisplayName(group)}"`,
        `${group.id} has no children attribute`
      );
    }
    const entries = group.children.slice(group.originalChildCount).map(id => listEntry(model, id));
    insertions.push(...listInsertions(model, group.childrenAnchor, entries));
  }

  for (const phase of model.buildPhases.values()) {
    if (phase.files.length <= phase.originalFileCount) continue;
    const entries = phase.files.slice(phase.originalFileCount).map(id => listEntry(model, id));
    insertions.push(...listInsertions(model, phase.filesAnchor, entries));
  }

  for (const [isa, ids] of model.addedOrder) {
    const section = model.sections.get(isa);
    if (!section || ids.length === 0) continue;

    const lead = section.endLineOffset > 0 && model.text[section.endLineOffset - 1] !== '\n' ? model.eol : '';
    const records = ids.map(id => renderRecord(model, isa, id, section.recordIndent)).join('');
    insertions.push({ offset: section.endLineOffset, text: lead + records });
  }

  if (insertions.length === 0) {
    return model.text;
  }

  // Stable: insertions at the same offset keep their generation order
  const ordered = insertions
    .map((insertion, index) => ({ insertion, index }))
    .sort((a, b) => a.insertion.offset - b.insertion.offset || a.index - b.index)
    .map(({ insertion }) => insertion);

  let output = '';
  let cursor = 0;
  for (const { offset, text } of ordered) {
    output += model.text.slice(cursor, offset) + text;
    cursor = offset;
  }
  return output + model.text.slice(cursor);
}

function listInsertions(model: DescriptorModel, anchor: ListAnchor, entries: string[]): Insertion[] {
  const insertions: Insertion[] = [];
  // The existing last entry needs its comma before anything follows it
  if (anchor.unseparatedEnd !== undefined) {
    insertions.push({ offset: anchor.unseparatedEnd, text: anchor.closeIndent === null ? ', ' : ',' });
  }
  if (anchor.closeIndent === null) {
    insertions.push({ offset: anchor.closeOffset, text: entries.map(entry => `${entry}, `).join('') });
  } else {
    insertions.push({
      offset: anchor.closeOffset - anchor.closeIndent.length,
      text: entries.map(entry => `${anchor.entryIndent}${entry},${model.eol}`).join(''),
    });
  }
  return insertions;
}

/**
 * `ID /* name *\/` for a list entry
 */
function listEntry(model: DescriptorModel, id: string): string {
  const name = commentFor(model, id);
  return name ? `${id} /* ${name} */` : id;
}

function commentFor(model: DescriptorModel, id: string): string {
  const ref = model.fileReferences.get(id);
  if (ref) return ref.name;
  const group = model.groups.get(id);
  if (group) return groupDisplayName(group);
  const buildFile = model.buildFiles.get(id);
  if (buildFile) return buildFile.displayName;
  return '';
}

function renderRecord(model: DescriptorModel, isa: string, id: string, indent: string): string {
  switch (isa) {
    case RecordKind.FileReference: {
      const ref = model.fileReferences.get(id);
      return ref ? renderFileReference(ref, indent, model.eol) : '';
    }
    case RecordKind.BuildFile: {
      const buildFile = model.buildFiles.get(id);
      return buildFile ? renderBuildFile(model, buildFile, indent, model.eol) : '';
    }
    case RecordKind.Group: {
      const group = model.groups.get(id);
      return group ? renderGroup(model, group, indent, model.eol) : '';
    }
    default:
      return '';
  }
}

function renderFileReference(ref: FileReference, indent: string, eol: string): string {
  const attrs = [
    'isa = PBXFileReference;',
    ref.lastKnownFileType ? `lastKnownFileType = ${quotePbxString(ref.lastKnownFileType)};` : '',
    ref.name !== lastSegment(ref.path) ? `name = ${quotePbxString(ref.name)};` : '',
    `path = ${quotePbxString(ref.path)};`,
    `sourceTree = ${quotePbxString(ref.sourceTree)};`,
  ].filter(Boolean);
  return `${indent}${ref.id} /* ${ref.name} */ = {${attrs.join(' ')} };${eol}`;
}

function renderBuildFile(model: DescriptorModel, buildFile: BuildFile, indent: string, eol: string): string {
  const fileRef = buildFile.fileRef ? ` fileRef = ${listEntry(model, buildFile.fileRef)};` : '';
  return `${indent}${buildFile.id} /* ${buildFile.displayName} */ = {isa = PBXBuildFile;${fileRef} };${eol}`;
}

function renderGroup(model: DescriptorModel, group: Group, indent: string, eol: string): string {
  const inner = `${indent}\t`;
  const lines = [
    `${indent}${group.id} /* ${groupDisplayName(group)} */ = {`,
    `${inner}isa = PBXGroup;`,
    `${inner}children = (`,
    ...group.children.map(child => `${inner}\t${listEntry(model, child)},`),
    `${inner});`,
  ];
  if (group.name !== undefined) lines.push(`${inner}name = ${quotePbxString(group.name)};`);
  if (group.path !== undefined) lines.push(`${inner}path = ${quotePbxString(group.path)};`);
  lines.push(`${inner}sourceTree = ${quotePbxString(group.sourceTree)};`, `${indent}};`);
  return lines.map(line => line + eol).join('');
}

function lastSegment(filePath: string): string {
  const slash = filePath.lastIndexOf('/');
  return slash === -1 ? filePath : filePath.slice(slash + 1);
}
