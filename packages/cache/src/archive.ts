/**
 * Zip archive access backed by adm-zip.
 */
import { mkdir } from "node:fs/promises";
import AdmZip from "adm-zip";
import { Effect } from "effect";
import { ArchiveError, type Archive } from "@ocrsets/core";

const open = (archivePath: string) =>
  Effect.try({
    try: () => new AdmZip(archivePath),
    catch: (cause) => new ArchiveError({ archive: archivePath, message: `Cannot open zip ${archivePath}`, cause }),
  });

export class ZipArchive implements Archive {
  extractAll(archivePath: string, dest: string): Effect.Effect<void, ArchiveError> {
    return Effect.gen(function* () {
      const zip = yield* open(archivePath);
      yield* Effect.tryPromise({
        try: () => mkdir(dest, { recursive: true }),
        catch: (cause) => new ArchiveError({ archive: archivePath, message: `Cannot create ${dest}`, cause }),
      });
      // overwrite: re-extracting over an earlier run is expected
      yield* Effect.try({
        try: () => zip.extractAllTo(dest, true),
        catch: (cause) => new ArchiveError({ archive: archivePath, message: `Failed to extract into ${dest}`, cause }),
      });
      yield* Effect.logDebug(`extracted ${archivePath} -> ${dest}`);
    });
  }

  readEntry(archivePath: string, member: string): Effect.Effect<Buffer, ArchiveError> {
    return Effect.flatMap(open(archivePath), (zip) => {
      const entry = zip.getEntry(member);
      if (entry === null) {
        return Effect.fail(
          new ArchiveError({ archive: archivePath, message: `Member ${member} not found in ${archivePath}` }),
        );
      }
      return Effect.try({
        try: () => entry.getData(),
        catch: (cause) => new ArchiveError({ archive: archivePath, message: `Cannot read ${member}`, cause }),
      });
    });
  }
}
