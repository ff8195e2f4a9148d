import fs from "fs";
import path from "path";
import { ManifestEntry } from "../models/manifest.model";
import { EventSink, PipelineState } from "../models/events";
import { describeError } from "../models/errors";
import { DownloadResult } from "./downloader.service";
import { isArchive } from "./archive.service";
import { UploadResult } from "./uploader.service";
import { withWorkspace } from "./workspace";

export interface PipelineConfig {
  /** Parent of every per-entry workspace. */
  scratchRoot: string;
  bucket: string;
}

/** Downloads a payload and checks it against the entry's checksum. */
export interface PayloadDownloader {
  download(entry: ManifestEntry, destinationPath: string): Promise<DownloadResult>;
}

export interface Expander {
  expand(archivePath: string, outputDir: string): Promise<string[]>;
}

export interface Uploader {
  upload(localPath: string, bucket: string, key: string): Promise<UploadResult>;
}

export interface PipelineDependencies {
  downloader: PayloadDownloader;
  expander: Expander;
  uploader: Uploader;
  sink: EventSink;
}

export interface TransferUnit {
  name: string;
  localPath: string;
  key: string;
}

export interface PipelineOutcome {
  entry: ManifestEntry;
  publishedKeys: string[];
}

const EXPANDED_DIR = "contents";

export function destinationKey(prefix: string, name: string): string {
  return prefix ? `${prefix}/${name}` : name;
}

/**
 * Download, verify, expand and publish one manifest entry.
 *
 * Steps run strictly in order inside a private workspace which is removed on
 * every exit path. A failed upload stops the remaining units; units already
 * published stay published.
 */
export class TransferPipeline {
  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: PipelineDependencies,
  ) {}

  async run(entry: ManifestEntry): Promise<ManifestEntry> {
    return (await this.execute(entry)).entry;
  }

  async execute(entry: ManifestEntry): Promise<PipelineOutcome> {
    const { sink } = this.deps;
    const publishedKeys: string[] = [];

    this.transition(entry, "start", `sample ${entry.sampleId}`);
    try {
      await withWorkspace(
        this.config.scratchRoot,
        (workspace) => this.transfer(entry, workspace, publishedKeys),
        {
          onCleanup: () => this.transition(entry, "cleanup"),
          onRemoved: (dir) =>
            sink.report({ type: "workspace_removed", fileId: entry.fileId, path: dir }),
        },
      );
    } catch (error) {
      this.transition(entry, "failed", describeError(error));
      sink.report({
        type: "run_failed",
        fileId: entry.fileId,
        error: describeError(error),
        publishedKeys: [...publishedKeys],
      });
      throw error;
    }

    this.transition(entry, "done");
    sink.report({
      type: "run_succeeded",
      fileId: entry.fileId,
      publishedKeys: [...publishedKeys],
    });
    return { entry, publishedKeys };
  }

  private async transfer(
    entry: ManifestEntry,
    workspace: string,
    publishedKeys: string[],
  ): Promise<void> {
    const { downloader, sink, uploader } = this.deps;
    const payloadPath = path.join(workspace, entry.fileId);

    this.transition(entry, "downloading");
    const download = await downloader.download(entry, payloadPath);

    // The digest is computed and compared while streaming.
    this.transition(entry, "verifying", `md5 ${download.checksum}`);

    this.transition(entry, "expanding");
    const units = await this.resolveUnits(entry, workspace, payloadPath);

    this.transition(entry, "uploading", `${units.length} file(s)`);
    for (const unit of units) {
      await uploader.upload(unit.localPath, this.config.bucket, unit.key);
      publishedKeys.push(unit.key);
      sink.report({ type: "unit_published", fileId: entry.fileId, key: unit.key });

      await fs.promises.rm(unit.localPath, { force: true });
      sink.report({ type: "unit_deleted", fileId: entry.fileId, path: unit.localPath });
    }
  }

  private async resolveUnits(
    entry: ManifestEntry,
    workspace: string,
    payloadPath: string,
  ): Promise<TransferUnit[]> {
    if (!isArchive(entry.fileId)) {
      return [
        {
          name: entry.fileId,
          localPath: payloadPath,
          key: destinationKey(entry.destinationPrefix, entry.fileId),
        },
      ];
    }

    const outputDir = path.join(workspace, EXPANDED_DIR);
    const names = await this.deps.expander.expand(payloadPath, outputDir);
    // The archive itself is never published.
    await fs.promises.rm(payloadPath, { force: true });

    return names.map((name) => ({
      name,
      localPath: path.join(outputDir, name),
      key: destinationKey(entry.destinationPrefix, name),
    }));
  }

  private transition(entry: ManifestEntry, state: PipelineState, detail?: string): void {
    this.deps.sink.report({ type: "transition", fileId: entry.fileId, state, detail });
  }
}
