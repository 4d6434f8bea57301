/**
 * Referential integrity checks
 *
 * Read-only: reports problems, never repairs them.
 */
import type { DescriptorModel, IntegrityIssue } from '../types/index.js';
import { GROUP_CHILD_KINDS, IssueKind, RecordKind } from '../types/index.js';

/**
 * Check every foreign key the engine understands
 */
export function verifyDescriptor(model: DescriptorModel): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];

  for (const buildFile of model.buildFiles.values()) {
    if (buildFile.fileRef && !model.objects.has(buildFile.fileRef)) {
      issues.push({
        kind: IssueKind.DanglingFileRef,
        recordId: buildFile.id,
        referenceId: buildFile.fileRef,
        message: `Build file ${buildFile.id} (${buildFile.displayName}) references missing file ${buildFile.fileRef}`,
      });
    }
  }

  for (const group of model.groups.values()) {
    const label = group.name ?? group.path ?? group.id;
    const namesSeen = new Set<string>();

    for (const childId of group.children) {
      const kind = model.objects.get(childId);
      if (!kind || !GROUP_CHILD_KINDS.has(kind)) {
        issues.push({
          kind: IssueKind.DanglingGroupChild,
          recordId: group.id,
          referenceId: childId,
          message: kind
            ? `Group "${label}" lists ${childId}, which is a ${kind}, not a file or group`
            : `Group "${label}" lists missing child ${childId}`,
        });
        continue;
      }

      const ref = model.fileReferences.get(childId);
      if (!ref) continue;
      if (namesSeen.has(ref.name)) {
        issues.push({
          kind: IssueKind.DuplicateGroupEntry,
          recordId: group.id,
          referenceId: childId,
          message: `Group "${label}" contains "${ref.name}" more than once`,
        });
      }
      namesSeen.add(ref.name);
    }
  }

  for (const phase of model.buildPhases.values()) {
    const compiled = new Map<string, string>();

    for (const entryId of phase.files) {
      if (model.objects.get(entryId) !== RecordKind.BuildFile) {
        issues.push({
          kind: IssueKind.DanglingPhaseEntry,
          recordId: phase.id,
          referenceId: entryId,
          message: `Build phase "${phase.name}" lists ${entryId}, which is not a build file`,
        });
        continue;
      }

      const fileRef = model.buildFiles.get(entryId)?.fileRef;
      if (!fileRef) continue;
      const previous = compiled.get(fileRef);
      if (previous) {
        const name = model.fileReferences.get(fileRef)?.name ?? fileRef;
        issues.push({
          kind: IssueKind.DuplicateBuildFile,
          recordId: phase.id,
          referenceId: entryId,
          message: `Build phase "${phase.name}" compiles "${name}" twice (${previous} and ${entryId})`,
        });
      } else {
        compiled.set(fileRef, entryId);
      }
    }
  }

  return issues;
}

/**
 * Stable key for comparing issue lists before and after a mutation
 */
export function issueKey(issue: IntegrityIssue): string {
  return `${issue.kind}:${issue.recordId}:${issue.referenceId}`;
}
