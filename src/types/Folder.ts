/**
 * Minecraft installation folders that can be selected for backup
 */
export enum Folder {
  Saves = 'saves',
  Mods = 'mods',
  Config = 'config',
  Logs = 'logs',
  Screenshots = 'screenshots',
  Backups = 'backups',
}

export const ALL_FOLDERS: readonly Folder[] = Object.freeze([
  Folder.Saves,
  Folder.Mods,
  Folder.Config,
  Folder.Logs,
  Folder.Screenshots,
  Folder.Backups,
]);

/**
 * Relative path segment of a folder under the Minecraft root
 */
export function folderPath(folder: Folder): string {
  switch (folder) {
    case Folder.Saves:
      return 'saves';
    case Folder.Mods:
      return 'mods';
    case Folder.Config:
      return 'config';
    case Folder.Logs:
      return 'logs';
    case Folder.Screenshots:
      return 'screenshots';
    case Folder.Backups:
      return 'backups';
    default: {
      const unknown: never = folder;
      throw new Error(`Unknown folder: ${String(unknown)}`);
    }
  }
}

/**
 * Parse a user supplied folder name (e.g. "Saves", " mods ")
 * @returns the matching folder, or null if the name is not recognized
 */
export function parseFolder(name: string): Folder | null {
  const normalized = name.trim().toLowerCase();
  return ALL_FOLDERS.find(folder => folder === normalized) ?? null;
}
