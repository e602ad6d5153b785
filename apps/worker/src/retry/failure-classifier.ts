export const ERROR_GENRES = [
  'proxy_block',
  'chrome_version',
  'other_process_exist',
  'unknown',
] as const;

export type ErrorGenre = (typeof ERROR_GENRES)[number];

/**
 * Exit statuses the crawl executable uses to report a known failure.
 */
export const EXIT_STATUS_TO_GENRE: ReadonlyMap<number, ErrorGenre> = new Map([
  [41, 'proxy_block'],
  [42, 'chrome_version'],
  [43, 'other_process_exist'],
  [44, 'unknown'],
]);

/**
 * Maps a process exit status to an error genre. Unmapped statuses, and runs
 * that produced no status at all, are unclassified.
 */
export function classifyExitStatus(exitStatus: number | null): ErrorGenre | null {
  if (exitStatus === null) {
    return null;
  }
  return EXIT_STATUS_TO_GENRE.get(exitStatus) ?? null;
}
