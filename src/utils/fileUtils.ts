import fs from 'fs/promises';
import path from 'path';
import { glob } from 'fast-glob';

/**
 * Read file content
 */
export async function readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
}

/**
 * Write content to file
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Check if directory exists
 */
export async function dirExists(dirPath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(dirPath);
        return stat.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Find files matching patterns; with `onlyFiles: false` directories match too
 */
export async function findFiles(
    directory: string,
    patterns: string | string[],
    options: { ignore?: string[]; absolute?: boolean; dot?: boolean; onlyFiles?: boolean } = {}
): Promise<string[]> {
    const { ignore = [], absolute = true, dot = true, onlyFiles = true } = options;

    const files = await glob(patterns, {
        cwd: directory,
        ignore,
        absolute,
        dot,
        onlyFiles,
    });

    return files.sort();
}

/**
 * Ensure directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Create a directory if needed and delete every file directly inside it.
 * Subdirectories are left alone.
 */
export async function emptyDir(dirPath: string): Promise<void> {
    await ensureDir(dirPath);

    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    for (const entry of entries) {
        if (entry.isFile() || entry.isSymbolicLink()) {
            await fs.rm(path.join(dirPath, entry.name), { force: true });
        }
    }
}
