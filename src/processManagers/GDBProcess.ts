/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { Readable } from 'stream';
import { ILogger } from '@vscode/debugadapter/lib/logger';
import {
    DEFAULT_STOP_TIMEOUT,
    STDOUT_DRAIN_TIMEOUT,
} from '../constants/session';
import { ProcessExited, ProcessTerminated } from '../gdb/errors';
import { isPrompt } from '../MIParser';
import { NamedLogger } from '../namedLogger';
import { IStdioProcess } from '../types/gdb';

/**
 * A running GDB: line oriented access to its standard streams plus
 * its lifecycle.
 */
export class GDBProcess {
    /** Resolves on the first prompt, once GDB accepts commands. */
    public readonly ready: Promise<void>;
    /** Resolves once the process has gone, or never started at all. */
    public readonly exited: Promise<ProcessExited>;
    /** Set when the process could not be spawned. */
    public spawnError?: Error;

    protected readonly logger: NamedLogger;
    protected readonly queue: string[] = [];
    protected closed = false;
    protected hasExited = false;
    protected wakeup?: () => void;
    protected stopping?: Promise<void>;

    constructor(
        protected readonly proc: IStdioProcess,
        name?: string,
        sink?: ILogger
    ) {
        this.logger = new NamedLogger(name, sink);

        let markReady: () => void = () => undefined;
        this.ready = new Promise<void>((resolve) => {
            markReady = resolve;
        });
        this.exited = new Promise<ProcessExited>((resolve) => {
            proc.on('exit', (code, signal) => {
                this.hasExited = true;
                this.logger.verbose(
                    `GDB exited with code ${code} and signal ${signal}`
                );
                // stdout normally ends by itself, unless an orphaned
                // inferior still holds it
                setTimeout(() => this.close(), STDOUT_DRAIN_TIMEOUT).unref();
                resolve(new ProcessExited(code, signal));
            });
            proc.on('error', (err) => {
                this.logger.error(`GDB process error: ${err.message}`);
                if (proc.getPID() === undefined) {
                    this.spawnError = err;
                    this.hasExited = true;
                    this.close();
                    resolve(new ProcessExited(null));
                }
            });
        });

        // A write to a GDB that has gone fails its own submit
        proc.stdin?.on('error', (err) => {
            this.logger.error(`GDB command pipe error: ${err.message}`);
        });

        const stdout = proc.stdout;
        if (!stdout) {
            this.closed = true;
            return;
        }
        const lineRegex = /(.*)(\r?\n)/;
        let buff = '';
        stdout.setEncoding('utf8');
        stdout.on('data', (chunk: string) => {
            buff += chunk;
            let regexArray = lineRegex.exec(buff);
            while (regexArray) {
                const line = regexArray[1];
                if (isPrompt(line)) {
                    markReady();
                }
                this.push(line);
                buff = buff.substring(
                    regexArray[1].length + regexArray[2].length
                );
                regexArray = lineRegex.exec(buff);
            }
        });
        stdout.on('end', () => this.close());
        stdout.on('close', () => this.close());
    }

    public getPID(): number | undefined {
        return this.proc.getPID();
    }

    public get stderr(): Readable | null {
        return this.proc.stderr;
    }

    public isActive(): boolean {
        return (
            !this.hasExited &&
            this.proc.exitCode === null &&
            this.proc.signalCode === null
        );
    }

    /**
     * Lines GDB writes to stdout, without line terminators. Ends when
     * stdout closes, which may be after the process itself exited.
     */
    public async *lines(): AsyncGenerator<string, void, undefined> {
        for (;;) {
            const line = this.queue.shift();
            if (line !== undefined) {
                yield line;
                continue;
            }
            if (this.closed) {
                return;
            }
            await new Promise<void>((resolve) => {
                this.wakeup = resolve;
            });
        }
    }

    /**
     * Write one line to GDB.
     *
     * @throws ProcessTerminated once GDB has exited
     */
    public submit(text: string): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const stdin = this.proc.stdin;
            if (!this.isActive() || !stdin || stdin.writableEnded) {
                reject(new ProcessTerminated());
                return;
            }
            stdin.write(`${text}\n`, (error) => {
                if (error) {
                    reject(
                        new ProcessTerminated(
                            `GDB command pipe closed: ${error.message}`
                        )
                    );
                } else {
                    resolve();
                }
            });
        });
    }

    /**
     * Terminate GDB, escalating to SIGKILL when it does not go away in
     * time. Calling it again, or after GDB exited, is harmless.
     */
    public stop(timeout = DEFAULT_STOP_TIMEOUT): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.terminate(timeout);
        }
        return this.stopping;
    }

    protected async terminate(timeout: number): Promise<void> {
        if (this.hasExited) {
            return;
        }
        this.logger.verbose(`GDB signal: SIGTERM to pid ${this.getPID()}`);
        this.proc.kill('SIGTERM');
        const timer = setTimeout(() => {
            if (!this.hasExited) {
                this.logger.warn(
                    `GDB did not exit after ${timeout}ms, sending SIGKILL`
                );
                this.proc.kill('SIGKILL');
            }
        }, timeout);
        try {
            await this.exited;
        } finally {
            clearTimeout(timer);
        }
    }

    protected push(line: string) {
        this.queue.push(line);
        this.notify();
    }

    protected close() {
        this.closed = true;
        this.notify();
    }

    protected notify() {
        const wakeup = this.wakeup;
        this.wakeup = undefined;
        wakeup?.();
    }
}
