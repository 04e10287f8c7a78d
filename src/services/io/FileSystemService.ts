import { access, mkdir, open, rm, type FileHandle } from 'node:fs/promises';
import { constants } from 'node:fs';
import { join, resolve } from 'node:path';
import { DatasetNotFoundError } from '../../lib/errors';
import { DatasetIdSchema } from '../../semantic/schema';
import type { DatasetHandle } from '../../types';

export interface FileWriter {
    readonly path: string;
    write(data: Uint8Array): Promise<void>;
    close(): Promise<void>;
    abort(): Promise<void>;
}

export interface DatasetStorage {
    resolve(datasetId: string): Promise<DatasetHandle>;
    createExportWriter(fileName: string): Promise<FileWriter>;
}

/**
 * Datasets live as canonical CSV files named `<id>.csv` in the input directory;
 * exports are written to the output directory.
 */
export class FileSystemService implements DatasetStorage {
    private inputDir: string;
    private outputDir: string;

    constructor(options: { inputDir: string; outputDir: string }) {
        this.inputDir = resolve(options.inputDir);
        this.outputDir = resolve(options.outputDir);
    }

    async resolve(datasetId: string): Promise<DatasetHandle> {
        if (!DatasetIdSchema.safeParse(datasetId).success) {
            throw new DatasetNotFoundError(datasetId);
        }

        const path = join(this.inputDir, `${datasetId}.csv`);
        try {
            await access(path, constants.R_OK);
        } catch {
            throw new DatasetNotFoundError(datasetId);
        }

        return { id: datasetId, path };
    }

    async createExportWriter(fileName: string): Promise<FileWriter> {
        await mkdir(this.outputDir, { recursive: true });
        const path = join(this.outputDir, fileName);
        const handle = await open(path, 'w');
        return new NodeFileWriter(path, handle);
    }
}

class NodeFileWriter implements FileWriter {
    private closed = false;

    constructor(readonly path: string, private handle: FileHandle) { }

    async write(data: Uint8Array): Promise<void> {
        await this.handle.write(data);
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.handle.close();
    }

    async abort(): Promise<void> {
        await this.close();
        // Partial artifacts are removed
        await rm(this.path, { force: true });
    }
}
