/*********************************************************************
 * Copyright (c) 2025 Arm Ltd. and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

import { ChildProcess } from 'child_process';
import { ExitListener, IStdioProcess } from '../types/gdb';
import { Writable, Readable } from 'stream';

// Exposes a spawned GDB through IStdioProcess, the shape the rest of
// the bridge (and the in-process fakes of the tests) works against.
export class StdioProcessAdapter implements IStdioProcess {
    constructor(private readonly proc: ChildProcess) {}

    get stdin(): Writable | null {
        return this.proc.stdin;
    }

    get stdout(): Readable | null {
        return this.proc.stdout;
    }

    get stderr(): Readable | null {
        return this.proc.stderr;
    }

    get exitCode(): number | null {
        return this.proc.exitCode;
    }

    get signalCode(): NodeJS.Signals | null {
        return this.proc.signalCode;
    }

    public getPID(): number | undefined {
        return this.proc.pid;
    }

    public kill(signal?: NodeJS.Signals): boolean {
        return this.proc.kill(signal);
    }

    public on(event: 'exit', listener: ExitListener): this;
    public on(event: 'error', listener: (err: Error) => void): this;
    public on(
        event: 'exit' | 'error',
        listener: ExitListener | ((err: Error) => void)
    ): this {
        this.proc.on(event, listener);
        return this;
    }
}
