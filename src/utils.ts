import * as fsPromises from 'fs/promises';
import * as path from 'path';

export type SayFn = (s: string) => void;
export type DbgFn = (s: string) => void;

export function dbg(s: string) {
    console.debug(s);
}

export function say(s: string) {
    console.log(s);
}

/**
 * Persists the given content to a file in the specified directory with the specified filename.
 *
 * @param content - The string content to save to file.
 * @param outputDir - The directory path where the output file should be created.
 * @param outputFileName - The name of the file to be created (e.g., 'history.json').
 * @param resolveFn - Function to resolve file paths (defaults to path.resolve).
 * @param writeFileFn - Function to write files (defaults to fs.promises.writeFile).
 * @returns The resolved path of the written file.
 * @throws Logs error and re-throws it to allow the caller to handle it.
 */
export async function persistOutput(
    content: string,
    outputDir: string,
    outputFileName: string,
    resolveFn: (...paths: string[]) => string = path.resolve,
    writeFileFn: (file: string, data: string, encoding: BufferEncoding) => Promise<void> = fsPromises.writeFile
): Promise<string> {
    const outputPath = resolveFn(outputDir, outputFileName);
    try {
        await writeFileFn(outputPath, content || "", 'utf-8');
        say(`Output saved to: ${outputPath}`);
        return outputPath;
    } catch (error) {
        console.error(`Error saving output to ${outputPath}:`, error);
        throw error;
    }
}

/** Deep copy for plain JSON-shaped data (the whole state tree is JSON-safe). */
export function deepCopy<T>(value: T): T {
    return JSON.parse(JSON.stringify(value));
}

/** Recursively freezes a plain object graph and returns it. */
export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
