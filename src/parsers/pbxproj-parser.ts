/**
 * Section and target parsing for Xcode project.pbxproj files
 *
 * Targets are told apart by productType rather than by name:
 * - com.apple.product-type.application (iOS/macOS app)
 * - com.apple.product-type.app-extension (extensions)
 * - com.apple.product-type.bundle.unit-test (unit tests)
 * - com.apple.product-type.bundle.ui-testing (UI tests)
 * - com.apple.product-type.framework (frameworks)
 */
import type { NativeTarget, SectionSpan } from '../types/index.js';
import { RecordKind } from '../types/index.js';
import { idListAttr, parseSectionRecords, stringAttr } from './pbx-syntax.js';
import type { ParsedRecord } from './pbx-syntax.js';

/**
 * Product types in priority order (highest first)
 */
export enum ProductType {
  Application = 'com.apple.product-type.application',
  ApplicationOnDemandInstall = 'com.apple.product-type.application.on-demand-install-capable',
  AppExtension = 'com.apple.product-type.app-extension',
  ExtensionKitExtension = 'com.apple.product-type.extensionkit-extension',
  WatchApp = 'com.apple.product-type.application.watchapp2',
  WatchExtension = 'com.apple.product-type.watchkit2-extension',
  TVExtension = 'com.apple.product-type.tv-app-extension',
  UnitTest = 'com.apple.product-type.bundle.unit-test',
  UITest = 'com.apple.product-type.bundle.ui-testing',
  Framework = 'com.apple.product-type.framework',
  StaticFramework = 'com.apple.product-type.framework.static',
  StaticLibrary = 'com.apple.product-type.library.static',
  DynamicLibrary = 'com.apple.product-type.library.dynamic',
  Bundle = 'com.apple.product-type.bundle',
  XPCService = 'com.apple.product-type.xpc-service',
}

/**
 * Product type priority for target selection
 * Higher number = higher priority = prefer this target
 */
const PRODUCT_TYPE_PRIORITY: Record<string, number> = {
  [ProductType.Application]: 100,
  [ProductType.ApplicationOnDemandInstall]: 95, // App Clip
  [ProductType.WatchApp]: 50,
  [ProductType.AppExtension]: 30,
  [ProductType.ExtensionKitExtension]: 30,
  [ProductType.WatchExtension]: 25,
  [ProductType.TVExtension]: 25,
  [ProductType.Framework]: 20,
  [ProductType.StaticFramework]: 20,
  [ProductType.StaticLibrary]: 15,
  [ProductType.DynamicLibrary]: 15,
  [ProductType.Bundle]: 10,
  [ProductType.XPCService]: 10,
  [ProductType.UnitTest]: 5,
  [ProductType.UITest]: 5,
};

const SECTION_BEGIN = /\/\*\s*Begin (\w+) section\s*\*\//g;

/**
 * Result of locating the object sections of a descriptor
 */
export interface SectionScan {
  sections: Map<string, SectionSpan>;
  /** Sections with a begin marker but no matching end marker */
  unterminated: string[];
}

/**
 * Locate every `/* Begin X section *\/` ... `/* End X section *\/` region
 *
 * @param content The raw pbxproj file content
 */
export function findSections(content: string): SectionScan {
  const sections = new Map<string, SectionSpan>();
  const unterminated: string[] = [];

  SECTION_BEGIN.lastIndex = 0;
  let match;
  while ((match = SECTION_BEGIN.exec(content)) !== null) {
    const isa = match[1];
    const afterMarker = match.index + match[0].length;
    const newline = content.indexOf('\n', afterMarker);
    const bodyStart = newline === -1 ? afterMarker : newline + 1;

    const endPattern = new RegExp(`/\\*\\s*End ${isa} section\\s*\\*/`, 'g');
    endPattern.lastIndex = afterMarker;
    const endMatch = endPattern.exec(content);
    if (!endMatch) {
      unterminated.push(isa);
      continue;
    }

    sections.set(isa, {
      isa,
      bodyStart: Math.min(bodyStart, endMatch.index),
      endLineOffset: lineStartIfIndented(content, endMatch.index),
      recordIndent: detectRecordIndent(content, bodyStart, endMatch.index),
    });
    SECTION_BEGIN.lastIndex = endMatch.index + endMatch[0].length;
  }

  return { sections, unterminated };
}

/**
 * Returns the start of the line holding `offset` when only whitespace precedes it
 */
export function lineStartIfIndented(content: string, offset: number): number {
  const lineStart = content.lastIndexOf('\n', offset - 1) + 1;
  return /^[ \t]*$/.test(content.slice(lineStart, offset)) ? lineStart : offset;
}

/**
 * Leading whitespace of the line holding `offset`, or null when other text precedes it
 */
export function indentBefore(content: string, offset: number): string | null {
  const lineStart = content.lastIndexOf('\n', offset - 1) + 1;
  const prefix = content.slice(lineStart, offset);
  return /^[ \t]*$/.test(prefix) ? prefix : null;
}

function detectRecordIndent(content: string, bodyStart: number, bodyEnd: number): string {
  const body = content.slice(bodyStart, bodyEnd);
  const firstRecord = body.match(/^([ \t]*)\S/m);
  return firstRecord ? firstRecord[1] : '\t\t';
}

/**
 * Parse the records of one section, or an empty list when the section is absent
 */
export function readSectionRecords(content: string, span: SectionSpan | undefined): ParsedRecord[] {
  if (!span) return [];
  return parseSectionRecords(content, span.bodyStart, span.endLineOffset);
}

/**
 * Convert a PBXNativeTarget record
 */
export function toNativeTarget(record: ParsedRecord): NativeTarget | undefined {
  const productType = stringAttr(record.body, 'productType') ?? '';
  if (!productType) return undefined;
  return {
    id: record.id,
    name: stringAttr(record.body, 'name') ?? record.comment ?? record.id,
    productType,
    productName: stringAttr(record.body, 'productName'),
    buildPhaseIds: idListAttr(record.body, 'buildPhases'),
  };
}

/**
 * Parse all PBXNativeTarget entries from pbxproj content
 *
 * @param content The raw pbxproj file content
 * @returns Array of parsed targets
 */
export function parsePbxprojTargets(content: string): NativeTarget[] {
  const { sections } = findSections(content);
  const targets: NativeTarget[] = [];
  for (const record of readSectionRecords(content, sections.get(RecordKind.NativeTarget))) {
    const target = toNativeTarget(record);
    if (target) targets.push(target);
  }
  return targets;
}

/**
 * Get the priority score for a product type
 * Higher = better candidate for main app
 */
export function getProductTypePriority(productType: string): number {
  return PRODUCT_TYPE_PRIORITY[productType] ?? 0;
}

/**
 * Check if a product type is an application
 */
export function isApplicationType(productType: string): boolean {
  return productType === ProductType.Application ||
         productType === ProductType.ApplicationOnDemandInstall;
}

/**
 * Check if a product type is a test target
 */
export function isTestType(productType: string): boolean {
  return productType === ProductType.UnitTest ||
         productType === ProductType.UITest;
}

/**
 * Get the main app target from a list of targets
 *
 * Selection criteria:
 * 1. Product type priority (application > extension > test)
 * 2. Name matching project name (tie-breaker)
 * 3. Shortest name (final fallback)
 *
 * @param projectName Optional project name for name-matching tie-breaker
 * @returns The best target, or undefined if no targets
 */
export function getMainAppTarget(
  targets: NativeTarget[],
  projectName?: string
): NativeTarget | undefined {
  if (targets.length === 0) {
    return undefined;
  }

  const normalize = (value: string) => value.toLowerCase().replace(/[^a-z0-9]/g, '');

  const sorted = [...targets].sort((a, b) => {
    const priorityA = getProductTypePriority(a.productType);
    const priorityB = getProductTypePriority(b.productType);

    if (priorityA !== priorityB) {
      return priorityB - priorityA;
    }

    if (projectName) {
      const normalizedProject = normalize(projectName);
      const normalizedA = normalize(a.name);
      const normalizedB = normalize(b.name);

      const matchA = normalizedA.includes(normalizedProject) || normalizedProject.includes(normalizedA);
      const matchB = normalizedB.includes(normalizedProject) || normalizedProject.includes(normalizedB);

      if (matchA && !matchB) return -1;
      if (matchB && !matchA) return 1;
    }

    // Prefer shorter names (less likely to be "MyAppTests", "MyAppUITests")
    return a.name.length - b.name.length;
  });

  return sorted[0];
}

/**
 * Get the product type of the main target in a project
 *
 * @param content The raw pbxproj file content
 * @param projectName Optional project name
 * @returns Product type string, or undefined if no target found
 */
export function getMainTargetProductType(
  content: string,
  projectName?: string
): string | undefined {
  const targets = parsePbxprojTargets(content);
  return getMainAppTarget(targets, projectName)?.productType;
}
