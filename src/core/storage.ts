/**
 * Reading and atomically replacing descriptor files
 */
import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';

export function readDescriptorFile(pbxprojPath: string): string {
  return fs.readFileSync(pbxprojPath, 'utf-8');
}

/**
 * Replace `pbxprojPath` with `content` through a temporary sibling and a rename,
 * so readers see either the old or the new descriptor and never a partial one.
 *
 * @returns false when the file already holds `content` and was left alone
 */
export function writeDescriptorAtomic(pbxprojPath: string, content: string): boolean {
  if (fs.existsSync(pbxprojPath) && fs.readFileSync(pbxprojPath, 'utf-8') === content) {
    return false;
  }

  const dir = path.dirname(pbxprojPath);
  const tempPath = path.join(dir, `.${path.basename(pbxprojPath)}.${randomBytes(6).toString('hex')}.tmp`);
  const mode = fs.existsSync(pbxprojPath) ? fs.statSync(pbxprojPath).mode : undefined;

  try {
    fs.writeFileSync(tempPath, content, { encoding: 'utf-8', mode });
    fs.renameSync(tempPath, pbxprojPath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
  return true;
}
