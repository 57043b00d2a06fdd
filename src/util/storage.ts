import * as fs from 'node:fs';
import path from 'node:path';

export interface Utility {
    createDirectory: (dirPath: string) => Promise<void>;
    readStream: (filePath: string) => Promise<fs.ReadStream>;
    writeChunks: (filePath: string, chunks: AsyncIterable<Uint8Array>) => Promise<number>;
    getFileSize: (filePath: string) => Promise<number>;
    copyFile: (source: string, destination: string) => Promise<void>;
    rename: (source: string, destination: string) => Promise<void>;
    deleteFile: (filePath: string) => Promise<boolean>;
}

const isNotFound = (error: unknown): boolean =>
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || ((message: string, ...args: unknown[]) => {
        process.stderr.write(`${message} ${args.map(String).join(' ')}\n`);
    });

    const createDirectory = async (dirPath: string): Promise<void> => {
        try {
            await fs.promises.mkdir(dirPath, { recursive: true });
        } catch (mkdirError: unknown) {
            throw new Error(`Failed to create output directory ${dirPath}: ${mkdirError instanceof Error ? mkdirError.message : String(mkdirError)}`, { cause: mkdirError });
        }
    };

    const readStream = async (filePath: string): Promise<fs.ReadStream> => {
        return fs.createReadStream(filePath);
    };

    // Writes each chunk as it arrives; the payload is never held in memory as a whole
    const writeChunks = async (filePath: string, chunks: AsyncIterable<Uint8Array>): Promise<number> => {
        await createDirectory(path.dirname(filePath));
        const handle = await fs.promises.open(filePath, 'w');
        let written = 0;
        try {
            for await (const chunk of chunks) {
                await handle.write(chunk);
                written += chunk.byteLength;
            }
        } finally {
            await handle.close();
        }
        return written;
    };

    const getFileSize = async (filePath: string): Promise<number> => {
        const stats = await fs.promises.stat(filePath);
        return stats.size;
    };

    const copyFile = async (source: string, destination: string): Promise<void> => {
        await createDirectory(path.dirname(destination));
        await fs.promises.copyFile(source, destination);
    };

    const rename = async (source: string, destination: string): Promise<void> => {
        await fs.promises.rename(source, destination);
    };

    // Returns false when there was nothing to delete
    const deleteFile = async (filePath: string): Promise<boolean> => {
        try {
            await fs.promises.unlink(filePath);
            return true;
        } catch (error: unknown) {
            if (isNotFound(error)) {
                log(`${filePath} was already removed`);
                return false;
            }
            throw error;
        }
    };

    return {
        createDirectory,
        readStream,
        writeChunks,
        getFileSize,
        copyFile,
        rename,
        deleteFile,
    };
};
