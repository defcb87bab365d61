import { writeFile } from 'node:fs/promises';
import sharp from 'sharp';

const describe = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Writes SVG markup to `path`. Resolves false on failure.
 */
export async function writeSvgFile(path: string, markup: string): Promise<boolean> {
  try {
    await writeFile(path, markup, 'utf8');
    return true;
  } catch (err) {
    console.warn(`plotframe: failed to write SVG to ${path}: ${describe(err)}`);
    return false;
  }
}

/**
 * Rasterizes SVG markup with sharp and writes a PNG to `path`. Resolves false on failure.
 */
export async function writePngFile(path: string, markup: string): Promise<boolean> {
  try {
    await sharp(Buffer.from(markup, 'utf8')).png().toFile(path);
    return true;
  } catch (err) {
    console.warn(`plotframe: failed to write PNG to ${path}: ${describe(err)}`);
    return false;
  }
}
