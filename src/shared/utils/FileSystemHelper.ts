/**
 * File System Helper
 *
 * Directory listing and report writing for the device-farm and reporting
 * paths, with failures routed through ErrorHandler.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorHandler, ErrorSeverity } from './ErrorHandler.js';

export class FileSystemHelper {
    /**
     * Ensure a directory exists, creating it if necessary
     */
    static ensureDir(dirPath: string): boolean {
        if (fs.existsSync(dirPath)) return true;

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.mkdirSync(dirPath, { recursive: true });
                return true;
            },
            { component: 'FileSystemHelper', operation: 'ensureDir', data: { dirPath } },
            false,
            ErrorSeverity.WARNING
        );
    }

    /**
     * Safely write text to a file
     */
    static safeWriteText(filePath: string, content: string): boolean {
        this.ensureDir(path.dirname(filePath));

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.writeFileSync(filePath, content);
                return true;
            },
            { component: 'FileSystemHelper', operation: 'safeWriteText', data: { filePath } },
            false,
            ErrorSeverity.ERROR
        );
    }

    /**
     * True when the path is a directory this process can read
     */
    static isReadableDirectory(dirPath: string): boolean {
        try {
            fs.accessSync(dirPath, fs.constants.R_OK);
            return fs.statSync(dirPath).isDirectory();
        } catch {
            return false;
        }
    }

    static isReadableFile(filePath: string): boolean {
        try {
            fs.accessSync(filePath, fs.constants.R_OK);
            return fs.statSync(filePath).isFile();
        } catch {
            return false;
        }
    }

    /**
     * Immediate subdirectory names, sorted
     */
    static listDirectories(dirPath: string): string[] {
        return ErrorHandler.safeExecuteSync(
            () => fs.readdirSync(dirPath, { withFileTypes: true })
                .filter(entry => entry.isDirectory())
                .map(entry => entry.name)
                .sort(),
            { component: 'FileSystemHelper', operation: 'listDirectories', data: { dirPath } },
            [],
            ErrorSeverity.WARNING
        );
    }

    /**
     * Find files recursively with depth limit.
     * Returns paths relative to `dirPath`, always '/'-separated.
     */
    static listFilesRecursive(
        dirPath: string,
        pattern: RegExp,
        maxDepth: number = 5
    ): string[] {
        const results: string[] = [];

        const search = (currentPath: string, relative: string, depth: number): void => {
            if (depth > maxDepth) return;

            const entries = ErrorHandler.safeExecuteSync(
                () => fs.readdirSync(currentPath, { withFileTypes: true }),
                { component: 'FileSystemHelper', operation: 'listFilesRecursive', data: { currentPath } },
                [],
                ErrorSeverity.WARNING
            );

            for (const entry of entries) {
                const rel = relative ? `${relative}/${entry.name}` : entry.name;
                if (entry.isDirectory()) {
                    search(path.join(currentPath, entry.name), rel, depth + 1);
                } else if (entry.isFile() && pattern.test(entry.name)) {
                    results.push(rel);
                }
            }
        };

        search(dirPath, '', 0);
        return results.sort();
    }
}
