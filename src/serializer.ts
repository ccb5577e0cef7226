import fs from 'fs-extra';
import * as os from 'node:os';
import * as path from 'node:path';
import { getWindow } from './loader.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Serialize a document to XML text with an XML declaration.
 */
export function serializeSvg(document: Document): string {
  const { XMLSerializer } = getWindow();
  return XML_DECLARATION + new XMLSerializer().serializeToString(document) + '\n';
}

/**
 * Write a document into `dir` and return the file path.
 */
export async function writeTempSvg(dir: string, document: Document, fileName = 'inlined.svg'): Promise<string> {
  const filePath = path.join(dir, fileName);
  await fs.outputFile(filePath, serializeSvg(document), 'utf8');
  return filePath;
}

/**
 * Run `fn` with a freshly created private directory and remove the directory
 * afterwards, whether `fn` resolved or threw.
 */
export async function withTempWorkspace<T>(
  fn: (dir: string) => Promise<T>,
  tempRoot: string = os.tmpdir()
): Promise<T> {
  await fs.ensureDir(tempRoot);
  const dir = await fs.mkdtemp(path.join(tempRoot, 'svg-inline-export-'));
  try {
    return await fn(dir);
  } finally {
    await fs.remove(dir);
  }
}
