/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { spawn } from 'child_process';
import { constants } from 'fs';
import { access } from 'fs/promises';
import { ILogger } from '@vscode/debugadapter/lib/logger';
import { dirname, isAbsolute, resolve, sep } from 'path';
import { GDB_ARGUMENTS } from '../constants/gdb';
import { errorMessage, LaunchFailure } from '../gdb/errors';
import { NamedLogger } from '../namedLogger';
import { IGDBProcessManager } from '../types/gdb';
import { GDBProcess } from './GDBProcess';
import { StdioProcessAdapter } from './StdioProcessAdapter';

/**
 * Starts GDB as a local child process.
 */
export class GDBFileSystemProcessManager implements IGDBProcessManager {
    protected readonly logger: NamedLogger;

    constructor(
        protected readonly name?: string,
        sink?: ILogger
    ) {
        this.logger = new NamedLogger(name, sink);
    }

    protected async checkAccess(
        path: string,
        mode: number,
        what: string
    ): Promise<void> {
        try {
            await access(path, mode);
        } catch (err) {
            throw new LaunchFailure(
                `${what} ${path} is not usable: ${errorMessage(err)}`
            );
        }
    }

    // Bare command names are looked up in PATH by spawn
    protected isPath(executable: string): boolean {
        return isAbsolute(executable) || executable.includes(sep);
    }

    public async start(
        gdbPath: string,
        programPath: string
    ): Promise<GDBProcess> {
        const gdb = this.isPath(gdbPath) ? resolve(gdbPath) : gdbPath;
        if (this.isPath(gdbPath)) {
            await this.checkAccess(gdb, constants.X_OK, 'GDB executable');
        }
        await this.checkAccess(programPath, constants.F_OK, 'Program');

        const program = resolve(programPath);
        const gdbArgs = [...GDB_ARGUMENTS, program];
        this.logger.verbose(`Starting ${gdb} ${gdbArgs.join(' ')}`);
        const child = spawn(gdb, gdbArgs, { cwd: dirname(program) });
        const proc = new GDBProcess(
            new StdioProcessAdapter(child),
            this.name,
            this.logger.sink
        );

        const exited = await Promise.race([
            proc.ready.then(() => undefined),
            proc.exited,
        ]);
        if (exited) {
            throw new LaunchFailure(
                proc.spawnError
                    ? `Failed to start ${gdbPath}: ${proc.spawnError.message}`
                    : `${gdbPath} exited before it was ready: ${exited.message}`
            );
        }
        return proc;
    }
}
