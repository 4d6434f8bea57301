/**
 * Mutation applier
 *
 * Applies a plan to a copy of the model. The input model is never modified,
 * so a failed operation leaves nothing behind and nothing reaches the writer.
 */
import type { DescriptorModel, MutationOperation, MutationPlan } from '../types/index.js';
import { GROUP_CHILD_KINDS, RecordKind } from '../types/index.js';
import { ReferentialIntegrityError } from './errors.js';
import { issueKey, verifyDescriptor } from './verify.js';

/**
 * Copy the model deeply enough that applying operations cannot reach the original
 */
export function cloneModel(model: DescriptorModel): DescriptorModel {
  return {
    ...model,
    sections: new Map(model.sections),
    objects: new Map(model.objects),
    fileReferences: new Map(model.fileReferences),
    buildFiles: new Map(model.buildFiles),
    groups: new Map([...model.groups].map(([id, group]) => [id, { ...group, children: [...group.children] }])),
    buildPhases: new Map([...model.buildPhases].map(([id, phase]) => [id, { ...phase, files: [...phase.files] }])),
    targets: [...model.targets],
    addedOrder: new Map([...model.addedOrder].map(([isa, ids]) => [isa, [...ids]])),
  };
}

/**
 * Apply every operation in order
 *
 * @throws ReferentialIntegrityError when an operation would create a dangling
 *   reference, reuse an identifier, or compile a file twice in one phase
 */
export function applyPlan(model: DescriptorModel, plan: MutationPlan): DescriptorModel {
  if (plan.operations.length === 0) {
    return model;
  }

  const next = cloneModel(model);
  for (const operation of plan.operations) {
    applyOperation(next, operation);
  }

  const before = new Set(verifyDescriptor(model).map(issueKey));
  const introduced = verifyDescriptor(next).filter(issue => !before.has(issueKey(issue)));
  if (introduced.length > 0) {
    throw new ReferentialIntegrityError('post-condition', introduced[0].referenceId, introduced[0].message);
  }

  return next;
}

function applyOperation(model: DescriptorModel, operation: MutationOperation): void {
  switch (operation.kind) {
    case 'AddGroup': {
      claimIdentifier(model, operation.kind, operation.groupId, RecordKind.Group);
      model.groups.set(operation.groupId, {
        id: operation.groupId,
        name: operation.name !== operation.path ? operation.name : undefined,
        path: operation.path,
        sourceTree: '<group>',
        children: [],
        originalChildCount: 0,
        added: true,
      });
      return;
    }

    case 'AddFileReference': {
      claimIdentifier(model, operation.kind, operation.fileRefId, RecordKind.FileReference);
      model.fileReferences.set(operation.fileRefId, {
        id: operation.fileRefId,
        name: operation.name,
        path: operation.path,
        lastKnownFileType: operation.lastKnownFileType,
        sourceTree: '<group>',
        added: true,
      });
      return;
    }

    case 'AddBuildFile': {
      if (!model.fileReferences.has(operation.fileRefId)) {
        throw new ReferentialIntegrityError(
          operation.kind,
          operation.fileRefId,
          `file reference ${operation.fileRefId} does not exist`
        );
      }
      claimIdentifier(model, operation.kind, operation.buildFileId, RecordKind.BuildFile);
      model.buildFiles.set(operation.buildFileId, {
        id: operation.buildFileId,
        fileRef: operation.fileRefId,
        displayName: operation.displayName,
        added: true,
      });
      return;
    }

    case 'AppendGroupChild': {
      const group = model.groups.get(operation.groupId);
      if (!group) {
        throw new ReferentialIntegrityError(operation.kind, operation.groupId, `group ${operation.groupId} does not exist`);
      }
      const childKind = model.objects.get(operation.childId);
      if (!childKind || !GROUP_CHILD_KINDS.has(childKind)) {
        throw new ReferentialIntegrityError(
          operation.kind,
          operation.childId,
          `child ${operation.childId} is not a file reference or group`
        );
      }
      if (operation.childId === operation.groupId || group.children.includes(operation.childId)) {
        throw new ReferentialIntegrityError(
          operation.kind,
          operation.childId,
          `group ${operation.groupId} already contains ${operation.childId}`
        );
      }
      group.children.push(operation.childId);
      return;
    }

    case 'AppendBuildPhaseEntry': {
      const phase = model.buildPhases.get(operation.phaseId);
      if (!phase) {
        throw new ReferentialIntegrityError(operation.kind, operation.phaseId, `build phase ${operation.phaseId} does not exist`);
      }
      const buildFile = model.buildFiles.get(operation.buildFileId);
      if (!buildFile) {
        throw new ReferentialIntegrityError(
          operation.kind,
          operation.buildFileId,
          `build file ${operation.buildFileId} does not exist`
        );
      }
      const alreadyCompiled = phase.files.some(
        id => id === buildFile.id || (buildFile.fileRef !== undefined && model.buildFiles.get(id)?.fileRef === buildFile.fileRef)
      );
      if (alreadyCompiled) {
        throw new ReferentialIntegrityError(
          operation.kind,
          operation.buildFileId,
          `build phase ${phase.id} already compiles ${buildFile.fileRef ?? buildFile.id}`
        );
      }
      phase.files.push(buildFile.id);
      return;
    }
  }
}

function claimIdentifier(model: DescriptorModel, operation: string, id: string, isa: RecordKind): void {
  if (model.objects.has(id)) {
    throw new ReferentialIntegrityError(operation, id, `identifier ${id} is already in use`);
  }
  model.objects.set(id, isa);
  const order = model.addedOrder.get(isa) ?? [];
  order.push(id);
  model.addedOrder.set(isa, order);
}
