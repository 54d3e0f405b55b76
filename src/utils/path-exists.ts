import { access } from "fs/promises";

/**
 * Whether anything (workbook, directory, CSV) is present at `path`
 * Broken symbolic links count as absent
 */
export async function pathExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}
