import fs from "fs";
import path from "path";
import zlib from "zlib";
import { pipeline } from "stream/promises";
import * as tar from "tar";
import { EventSink } from "../models/events";
import { ArchiveError, describeError } from "../models/errors";

export const ARCHIVE_SUFFIXES = [".tar"];
export const COMPRESSION_SUFFIX = ".gz";

const REGULAR_FILE_TYPES = new Set(["File", "OldFile", "ContiguousFile"]);

export interface ArchiveExpanderOptions {
  /** Gunzip `.gz` members after extraction. */
  decompressMembers: boolean;
}

export function isArchive(fileId: string): boolean {
  return ARCHIVE_SUFFIXES.some((suffix) => fileId.endsWith(suffix));
}

export function decompressedName(name: string): string {
  return name.endsWith(COMPRESSION_SUFFIX)
    ? name.slice(0, -COMPRESSION_SUFFIX.length)
    : name;
}

function memberName(entryPath: string): string {
  return path.posix.normalize(entryPath.replace(/^\/+/, ""));
}

export class ArchiveExpander {
  constructor(
    private readonly options: ArchiveExpanderOptions,
    private readonly sink: EventSink,
  ) {}

  /**
   * Extract every regular file of `archivePath` into `outputDir`.
   *
   * @returns member names relative to `outputDir`, in archive order, with
   * decompressed members listed under their decompressed name
   */
  async expand(archivePath: string, outputDir: string): Promise<string[]> {
    const archive = path.basename(archivePath);
    const members: string[] = [];
    const escaping: string[] = [];

    // Entries are seen here before tar checks their paths.
    const extractOptions = {
      file: archivePath,
      cwd: outputDir,
      strict: true,
      onentry: (entry: tar.ReadEntry) => {
        if (entry.type === undefined || !REGULAR_FILE_TYPES.has(entry.type)) {
          return;
        }
        const name = memberName(entry.path);
        if (name === ".." || name.startsWith("../")) {
          escaping.push(name);
          return;
        }
        members.push(name);
      },
    };

    await fs.promises.mkdir(outputDir, { recursive: true });
    try {
      await tar.x(extractOptions);
    } catch (error) {
      if (escaping.length > 0) {
        throw new ArchiveError(archive, `member ${escaping[0]} escapes the output directory`, error);
      }
      throw new ArchiveError(archive, `extraction failed: ${describeError(error)}`, error);
    }
    if (escaping.length > 0) {
      throw new ArchiveError(archive, `member ${escaping[0]} escapes the output directory`);
    }
    this.sink.report({ type: "archive_extracted", archive, members });

    if (!this.options.decompressMembers) {
      return members;
    }

    const names: string[] = [];
    for (const member of members) {
      if (member.endsWith(COMPRESSION_SUFFIX)) {
        names.push(await this.decompress(archive, outputDir, member));
      } else {
        names.push(member);
      }
    }
    return names;
  }

  /**
   * Gunzip `member` into a sibling without the suffix and delete the
   * compressed file.
   */
  async decompress(archive: string, outputDir: string, member: string): Promise<string> {
    const target = decompressedName(member);
    const sourcePath = path.join(outputDir, member);
    const targetPath = path.join(outputDir, target);

    try {
      await pipeline(
        fs.createReadStream(sourcePath),
        zlib.createGunzip(),
        fs.createWriteStream(targetPath),
      );
    } catch (error) {
      await fs.promises.rm(targetPath, { force: true });
      throw new ArchiveError(
        archive,
        `decompressing ${member} failed: ${describeError(error)}`,
        error,
      );
    }

    await fs.promises.rm(sourcePath);
    this.sink.report({ type: "member_decompressed", archive, from: member, to: target });
    return target;
  }
}
