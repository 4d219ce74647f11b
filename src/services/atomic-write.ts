import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Replace `targetPath` with `data` in one rename.
 *
 * The data goes to a temp file in the same directory (same filesystem),
 * is fsynced, then renamed over the target. Readers see either the old
 * content or the new content, never a partial write. The target's file
 * mode is carried over when the target already exists.
 */
export function atomicWriteFileSync(targetPath: string, data: string): void {
  const dir = path.dirname(targetPath);
  const tempPath = path.join(dir, `.${path.basename(targetPath)}.tmp.${crypto.randomUUID()}`);
  const mode = fs.existsSync(targetPath) ? fs.statSync(targetPath).mode & 0o777 : 0o644;

  let success = false;

  try {
    const fd = fs.openSync(tempPath, 'wx', mode);
    try {
      fs.writeSync(fd, data);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    fs.renameSync(tempPath, targetPath);
    success = true;
  } finally {
    if (!success && fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
  }
}
