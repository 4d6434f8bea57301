/**
 * Compilable source extensions and the file type Xcode records for them
 */
import * as path from 'path';

export const SOURCE_FILE_TYPES: Record<string, string> = {
  '.swift': 'sourcecode.swift',
  '.m': 'sourcecode.c.objc',
  '.mm': 'sourcecode.cpp.objcpp',
  '.c': 'sourcecode.c.c',
  '.cc': 'sourcecode.cpp.cpp',
  '.cpp': 'sourcecode.cpp.cpp',
  '.cxx': 'sourcecode.cpp.cpp',
  '.metal': 'sourcecode.metal',
};

export const DEFAULT_SOURCE_EXTENSIONS = Object.keys(SOURCE_FILE_TYPES);

/**
 * File type for a name, or undefined when the extension is not among `extensions`
 */
export function sourceFileType(
  fileName: string,
  extensions: readonly string[] = DEFAULT_SOURCE_EXTENSIONS
): string | undefined {
  const ext = path.extname(fileName).toLowerCase();
  if (!ext || !extensions.includes(ext)) {
    return undefined;
  }
  return SOURCE_FILE_TYPES[ext] ?? 'sourcecode';
}
