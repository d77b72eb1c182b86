import { basename, globFiles, isDirectory } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { Transformation } from './request.js';

/**
 * List the `<rule>.nix` overlays in `dir`, minus excluded rules, sorted by
 * rule name. Only the top level counts: subdirectories such as `lib/` hold
 * helpers the overlays import. A missing directory means no transformations.
 */
export async function discoverTransformations(
  dir: string,
  excluded: ReadonlySet<string> = new Set()
): Promise<Transformation[]> {
  if (!(await isDirectory(dir))) {
    logger.debug(`No transformations directory at ${dir}`);
    return [];
  }

  const files = await globFiles('*.nix', { cwd: dir, absolute: true });
  return files
    .map((file) => ({ name: basename(file, '.nix'), path: file }))
    .filter((t) => !excluded.has(t.name))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
