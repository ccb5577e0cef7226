/**
 * Run configuration.
 *
 * Values come from the environment and are overridden by command-line flags.
 *   INKSCAPE_BIN          converter executable (default: inkscape)
 *   SVG_INLINE_TMPDIR     where temp workspaces are created (default: OS temp dir)
 *   SVG_INLINE_PLAIN_SVG  "0"/"false" skips the plain-SVG normalization step
 */

import * as os from 'node:os';

export interface ExportConfig {
  converter: string;
  tempRoot: string;
  plainSvg: boolean;
  verbose: boolean;
}

const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Build configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const converter = env.INKSCAPE_BIN?.trim();
  const tempRoot = env.SVG_INLINE_TMPDIR?.trim();
  const plainSvg = env.SVG_INLINE_PLAIN_SVG?.trim().toLowerCase();

  return {
    converter: converter || 'inkscape',
    tempRoot: tempRoot || os.tmpdir(),
    plainSvg: plainSvg ? !FALSE_VALUES.has(plainSvg) : true,
    verbose: false
  };
}
