import fs from 'fs';
import * as path from 'path';

export class FileSystem {
    /**
     * Replaces `path` with the JSON of `data`, creating missing directories.
     * The JSON goes to a temporary file beside it first, so readers never see a partial write.
     */
    public static async saveToFile<T>(filePath: string, data: T): Promise<void> {
        const dir = path.dirname(filePath);
        await fs.promises.mkdir(dir, { recursive: true });

        const tmpPath = path.join(
            dir,
            `.${ path.basename(filePath) }.${ process.pid }.${ Date.now() }-${ Math.random().toString(16).slice(2) }.tmp`,
        );

        try {
            await FileSystem._writeJson(tmpPath, data);
            await fs.promises.rename(tmpPath, filePath);
        } catch (e) {
            await fs.promises.rm(tmpPath, { force: true });
            throw e;
        }
    }

    /**
     * Parsed JSON of `path`, unchecked. Rejects when the file is missing or not JSON.
     */
    public static loadFromFile(filePath: string): Promise<unknown> {
        return new Promise((resolve, reject) => {
            const readStream = fs.createReadStream(filePath, { autoClose: true, encoding: 'utf-8' });

            let result = '';

            readStream.on('error', (e) => {
                reject(e);
            });

            readStream.on('data', (chunk) => {
                result += chunk.toString();
            });

            readStream.on('end', () => {
                try {
                    resolve(JSON.parse(result));
                } catch (e) {
                    reject(e);
                }
            });
        });
    }

    public static async exists(filePath: string): Promise<boolean> {
        return fs.promises.access(filePath, fs.constants.F_OK)
        .then(() => true)
        .catch(() => false);
    }

    private static _writeJson<T>(filePath: string, data: T): Promise<void> {
        return new Promise((resolve, reject) => {
            const writer = fs.createWriteStream(filePath, { autoClose: true, });

            writer.on('error', (e) => {
                reject(e);
            });

            writer.on('finish', () => {
                resolve();
            });

            writer.write(JSON.stringify(data, null, 2));

            writer.end();
        });
    }
}
