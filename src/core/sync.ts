/**
 * Core sync engine
 */
import * as path from 'path';
import type { CandidateFile, MutationPlan, SyncOptions, SyncResult, VerifyResult } from '../types/index.js';
import { locateProject } from '../parsers/project-locator.js';
import type { ProjectLocation } from '../parsers/project-locator.js';
import { readDescriptor } from '../parsers/descriptor-reader.js';
import { loadConfig, resolveSettings } from './config.js';
import type { Settings } from './config.js';
import { discoverSourceFiles, toCandidate } from './discovery.js';
import { collectIdentifiers, createIdGenerator } from './identifiers.js';
import { planMutations } from './planner.js';
import { applyPlan } from './applier.js';
import { writeDescriptor } from './descriptor-writer.js';
import { readDescriptorFile, writeDescriptorAtomic } from './storage.js';
import { verifyDescriptor } from './verify.js';

/**
 * Register missing source files in the project
 *
 * Nothing is written when the plan is empty, on a dry run, or when any step fails.
 */
export async function syncSources(options: SyncOptions): Promise<SyncResult> {
  const startTime = Date.now();

  const location = locateProject(options.path);
  const { config } = loadConfig(location.projectDir, options.configPath);
  const settings = resolveSettings(location.projectDir, config, {
    sourceRoot: options.sourceRoot,
    target: options.target,
    createGroups: options.createGroups,
  });

  // Read fully before any decision
  const model = readDescriptor(readDescriptorFile(location.pbxprojPath));

  const candidates = collectCandidates(options, location, settings);
  const plan = planMutations(model, candidates, {
    idGenerator: options.idGenerator ?? createIdGenerator(collectIdentifiers(model)),
    targetName: settings.target,
    projectName: location.projectName,
    createGroups: settings.createGroups,
    extensions: settings.extensions,
  });

  const next = applyPlan(model, plan);
  const dryRun = options.dryRun ?? false;
  let written = false;
  if (!dryRun && plan.operations.length > 0) {
    written = writeDescriptorAtomic(location.pbxprojPath, writeDescriptor(next));
  }

  return toSyncResult(location, plan, {
    dryRun,
    written,
    duration: Date.now() - startTime,
  });
}

function collectCandidates(options: SyncOptions, location: ProjectLocation, settings: Settings): CandidateFile[] {
  if (options.files && options.files.length > 0) {
    return options.files.map(file => toCandidate(file, location.projectDir));
  }
  return discoverSourceFiles(settings.sourceRoot, location.projectDir, {
    extensions: settings.extensions,
    exclude: settings.exclude,
  });
}

function toSyncResult(
  location: ProjectLocation,
  plan: MutationPlan,
  run: { dryRun: boolean; written: boolean; duration: number }
): SyncResult {
  return {
    pbxprojPath: location.pbxprojPath,
    timestamp: new Date(),
    targetName: plan.targetName,
    added: plan.files.map(file => ({
      name: file.candidate.displayName,
      path: file.candidate.relativePath,
      group: file.groupPath,
    })),
    skipped: plan.skipped.map(({ candidate, reason }) => ({
      name: candidate.displayName,
      path: candidate.relativePath,
      reason,
    })),
    createdGroups: plan.createdGroups,
    operations: plan.operations.length,
    ...run,
  };
}

/**
 * Check the project's descriptor for dangling and duplicate references
 */
export async function verifyProject(inputPath: string): Promise<VerifyResult> {
  const location = locateProject(inputPath);
  const model = readDescriptor(readDescriptorFile(location.pbxprojPath));

  return {
    pbxprojPath: path.resolve(location.pbxprojPath),
    timestamp: new Date(),
    issues: verifyDescriptor(model),
    counts: {
      fileReferences: model.fileReferences.size,
      buildFiles: model.buildFiles.size,
      groups: model.groups.size,
      buildPhases: model.buildPhases.size,
    },
  };
}
