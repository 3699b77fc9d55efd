/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import EventEmitter from 'events';
import { Readable, Writable } from 'stream';
import {
    MIArgument,
    MIAsyncRecord,
    MIResultRecord,
    MITuple,
} from '../mi/base';
import type { GDBProcess } from '../processManagers/GDBProcess';

export type ExitListener = (
    code: number | null,
    signal: NodeJS.Signals | null
) => void;

export interface IStdioProcess {
    get stdin(): Writable | null;
    get stdout(): Readable | null;
    get stderr(): Readable | null;
    getPID: () => number | undefined;
    get exitCode(): number | null;
    get signalCode(): NodeJS.Signals | null;
    kill: (signal?: NodeJS.Signals) => boolean;
    on(event: 'exit', listener: ExitListener): this;
    on(event: 'error', listener: (err: Error) => void): this;
}

export interface IGDBProcessManager {
    /**
     * Launch GDB on the program and wait for its first prompt.
     *
     * @throws LaunchFailure
     */
    start: (gdbPath: string, programPath: string) => Promise<GDBProcess>;
}

export interface IGDBBackend extends EventEmitter {
    spawn(gdbPath: string, programPath: string): Promise<void>;

    /** Send a command and resolve with its result record of any class. */
    send(command: string, args?: MIArgument[]): Promise<MIResultRecord>;

    /** Send a command and resolve with its results, rejecting on `^error`. */
    sendCommand(command: string, args?: MIArgument[]): Promise<MITuple>;

    /** Send a command typed by a user, either MI or GDB CLI. */
    sendUserCommand(text: string): Promise<MITuple>;

    /** Forget every command still waiting for a result without settling it. */
    abandonAll(): void;

    /** Number of commands still waiting for a result. */
    get pendingCount(): number;

    isActive: () => boolean;

    stop(): Promise<void>;

    on(
        event: 'consoleStreamOutput',
        listener: (output: string, category: string) => void
    ): this;
    on(
        event: 'execAsync' | 'notifyAsync' | 'statusAsync',
        listener: (record: MIAsyncRecord) => void
    ): this;
    on(event: 'resultAsync', listener: (record: MIResultRecord) => void): this;
    on(event: 'exit', listener: ExitListener): this;

    emit(
        event: 'consoleStreamOutput',
        output: string,
        category: string
    ): boolean;
    emit(
        event: 'execAsync' | 'notifyAsync' | 'statusAsync',
        record: MIAsyncRecord
    ): boolean;
    emit(event: 'resultAsync', record: MIResultRecord): boolean;
    emit(
        event: 'exit',
        code: number | null,
        signal: NodeJS.Signals | null
    ): boolean;
}
