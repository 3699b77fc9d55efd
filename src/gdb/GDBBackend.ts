/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import * as events from 'events';
import { ILogger } from '@vscode/debugadapter/lib/logger';
import { decodeLine, isPrompt } from '../MIParser';
import {
    encodeCommand,
    getString,
    MIArgument,
    MIRecord,
    MIResultRecord,
    MITuple,
} from '../mi/base';
import { IGDBBackend, IGDBProcessManager } from '../types/gdb';
import { GDBProcess } from '../processManagers/GDBProcess';
import { NamedLogger } from '../namedLogger';
import {
    errorMessage,
    GDBError,
    ProcessExited,
    ProcessTerminated,
} from './errors';

interface PendingCommand {
    command: string;
    resolve: (record: MIResultRecord) => void;
    reject: (error: Error) => void;
}

/**
 * Correlates MI commands with their result records by token and hands
 * every other record to listeners, in the order GDB wrote them.
 */
export class GDBBackend extends events.EventEmitter implements IGDBBackend {
    protected logger: NamedLogger;
    protected token = 0;
    /** Tokens wrap to 1 after this one. */
    protected maxToken = Number.MAX_SAFE_INTEGER;
    protected readonly pending = new Map<number, PendingCommand>();
    protected proc?: GDBProcess;
    protected exitError?: ProcessExited;
    protected reader?: Promise<void>;

    constructor(
        protected readonly processManager: IGDBProcessManager,
        protected readonly name?: string,
        sink?: ILogger
    ) {
        super();
        this.logger = new NamedLogger(name, sink);
    }

    public get pendingCount(): number {
        return this.pending.size;
    }

    /** Settles once GDB's output has ended and its exit was handled. */
    public get closed(): Promise<void> {
        return this.reader ?? Promise.resolve();
    }

    public async spawn(gdbPath: string, programPath: string) {
        this.attach(await this.processManager.start(gdbPath, programPath));
    }

    /**
     * Start reading the output of a GDB that is already up.
     */
    public attach(proc: GDBProcess) {
        this.proc = proc;
        this.logger.verbose(`Spawned GDB (PID ${proc.getPID()})`);
        proc.stderr?.on('data', (chunk: Buffer | string) => {
            this.emit('consoleStreamOutput', chunk.toString(), 'stderr');
        });
        this.reader = this.readOutput(proc).catch((err) =>
            this.logger.error(`Reading GDB output failed: ${errorMessage(err)}`)
        );
    }

    protected async readOutput(proc: GDBProcess): Promise<void> {
        for await (const line of proc.lines()) {
            this.handleLine(line);
        }
        this.handleExit(await proc.exited);
    }

    protected handleLine(line: string) {
        if (!line.length || isPrompt(line)) {
            return;
        }
        let record: MIRecord;
        try {
            record = decodeLine(line);
        } catch (err) {
            this.logger.warn(errorMessage(err));
            return;
        }
        this.dispatch(record);
    }

    /**
     * Route one record: results to the command waiting for them,
     * everything else to listeners.
     */
    public dispatch(record: MIRecord) {
        switch (record.kind) {
            case 'result': {
                const token = record.token;
                this.logger.verbose(
                    `GDB result: ${token ?? ''} ${record.resultClass}`
                );
                const command =
                    token !== undefined ? this.pending.get(token) : undefined;
                if (token === undefined || !command) {
                    this.logger.error(
                        `GDB response with no command: ${token ?? ''}`
                    );
                    return;
                }
                this.pending.delete(token);
                // Listeners see the result before the waiter resumes
                this.emit('resultAsync', record);
                command.resolve(record);
                break;
            }
            case 'exec-async':
                this.logger.verbose(`GDB exec async: ${record.asyncClass}`);
                this.emit('execAsync', record);
                break;
            case 'notify-async':
                this.logger.verbose(`GDB notify async: ${record.asyncClass}`);
                this.emit('notifyAsync', record);
                break;
            case 'status-async':
                this.logger.verbose(`GDB status async: ${record.asyncClass}`);
                this.emit('statusAsync', record);
                break;
            case 'console-stream':
                this.emit(
                    'consoleStreamOutput',
                    record.text,
                    record.passthrough ? 'stdout' : 'console'
                );
                break;
            case 'target-stream':
                this.emit('consoleStreamOutput', record.text, 'stdout');
                break;
            case 'log-stream':
                this.logger.log(record.text.trimEnd());
                break;
        }
    }

    protected handleExit(exit: ProcessExited) {
        this.exitError = exit;
        this.rejectAll(exit);
        this.emit('exit', exit.exitCode, exit.signal);
    }

    public send(
        command: string,
        args: MIArgument[] = []
    ): Promise<MIResultRecord> {
        return new Promise<MIResultRecord>((resolve, reject) => {
            const proc = this.proc;
            if (!proc || this.exitError) {
                reject(new ProcessTerminated('GDB is not running'));
                return;
            }
            const token = this.nextToken();
            const line = encodeCommand(token, command, args);
            this.logger.verbose(`GDB command: ${line}`);
            this.pending.set(token, { command: line, resolve, reject });
            proc.submit(line).catch((err: unknown) => {
                // Only if it is still ours to settle
                if (this.pending.delete(token)) {
                    reject(
                        err instanceof Error ? err : new ProcessTerminated()
                    );
                }
            });
        });
    }

    public async sendCommand(
        command: string,
        args?: MIArgument[]
    ): Promise<MITuple> {
        const record = await this.send(command, args);
        switch (record.resultClass) {
            case 'done':
            case 'running':
            case 'connected':
            case 'exit':
                return record.results;
            case 'error': {
                const message = getString(record.results, 'msg');
                this.logger.verbose(
                    `GDB command: ${command} failed with '${message}'`
                );
                throw new GDBError(
                    message ?? `${command} failed`,
                    command,
                    getString(record.results, 'code')
                );
            }
            default:
                throw new GDBError(
                    `Unknown response ${record.resultClass}: ${JSON.stringify(
                        record.results
                    )}`,
                    command
                );
        }
    }

    public sendUserCommand(text: string): Promise<MITuple> {
        const trimmed = text.trim();
        if (!trimmed.startsWith('-')) {
            return this.sendCommand('interpreter-exec', ['console', trimmed]);
        }
        const space = trimmed.indexOf(' ');
        return space < 0
            ? this.sendCommand(trimmed)
            : this.sendCommand(trimmed.substring(0, space), [
                  { verbatim: trimmed.substring(space + 1) },
              ]);
    }

    public abandonAll() {
        if (this.pending.size) {
            this.logger.verbose(
                `Abandoning ${this.pending.size} pending GDB command(s)`
            );
        }
        this.pending.clear();
    }

    public rejectAll(error: Error) {
        const commands = [...this.pending.values()];
        this.pending.clear();
        for (const command of commands) {
            this.logger.verbose(
                `GDB command: ${command.command} failed with '${error.message}'`
            );
            command.reject(error);
        }
    }

    public isActive(): boolean {
        return !!this.proc && !this.exitError && this.proc.isActive();
    }

    public async stop(): Promise<void> {
        await this.proc?.stop();
    }

    protected nextToken(): number {
        // Never hand out a token that is still waiting for its result
        for (let tries = 0; tries <= this.pending.size; tries++) {
            this.token = this.token >= this.maxToken ? 1 : this.token + 1;
            if (!this.pending.has(this.token)) {
                return this.token;
            }
        }
        throw new Error('No free MI command token');
    }
}
