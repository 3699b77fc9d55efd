/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { basename } from 'path';
import {
    BreakpointEvent,
    ExitedEvent,
    Module,
    ModuleEvent,
    OutputEvent,
    TerminatedEvent,
    ThreadEvent,
} from '@vscode/debugadapter';
import { DebugProtocol } from '@vscode/debugprotocol';
import { EXIT_REASONS, QUIET_NOTIFICATIONS } from '../constants/gdb';
import {
    getNumber,
    getString,
    getTuple,
    MIAsyncRecord,
    MIBreakpointInfo,
    MITuple,
    toBreakpointInfo,
} from '../mi/base';
import { ContinuedEvent } from './continuedEvent';
import { StoppedEvent } from './stoppedEvent';

/** Thread reported when GDB names none, as before threads exist. */
export const DEFAULT_THREAD_ID = 1;

export interface TranslatedRecord {
    events: DebugProtocol.Event[];
    /** False when the record's class has no mapping of its own. */
    handled: boolean;
}

export function toDapBreakpoint(
    bkpt: MIBreakpointInfo
): DebugProtocol.Breakpoint {
    const breakpoint: DebugProtocol.Breakpoint = {
        id: parseInt(bkpt.number, 10),
        verified: bkpt.pending === undefined,
    };
    const path = bkpt.fullname ?? bkpt.file;
    if (path) {
        breakpoint.source = { name: basename(path), path };
    }
    if (bkpt.line !== undefined) {
        breakpoint.line = bkpt.line;
    }
    return breakpoint;
}

/**
 * `exit-code` is printed in octal. An inferior killed by a signal
 * reports none.
 */
export function parseExitCode(results: MITuple): number {
    const code = getString(results, 'exit-code');
    if (code !== undefined) {
        const parsed = parseInt(code, 8);
        if (!isNaN(parsed)) {
            return parsed;
        }
    }
    return getString(results, 'reason') === 'exited-signalled' ? 1 : 0;
}

function threadId(results: MITuple): number {
    return getNumber(results, 'thread-id') ?? DEFAULT_THREAD_ID;
}

function handled(...events: DebugProtocol.Event[]): TranslatedRecord {
    return { events, handled: true };
}

function unhandled(record: MIAsyncRecord): TranslatedRecord {
    return {
        events: [
            new OutputEvent(
                `Unhandled GDB ${record.kind} record: ${record.asyncClass}\n`,
                'console',
                record
            ),
        ],
        handled: false,
    };
}

/**
 * Every stop is reported with GDB's reason. When the program is gone
 * the stop is followed by its exit code and the end of the session.
 */
function translateStopped(results: MITuple): TranslatedRecord {
    const reason = getString(results, 'reason') ?? 'unknown';
    const bkptno = getNumber(results, 'bkptno');
    const stopped = new StoppedEvent(
        reason,
        threadId(results),
        getString(results, 'stopped-threads') === 'all',
        bkptno !== undefined ? [bkptno] : undefined
    );
    if (EXIT_REASONS.has(reason)) {
        return handled(
            stopped,
            new ExitedEvent(parseExitCode(results)),
            new TerminatedEvent()
        );
    }
    return handled(stopped);
}

function translateExec(record: MIAsyncRecord): TranslatedRecord {
    switch (record.asyncClass) {
        case 'running': {
            const all = getString(record.results, 'thread-id') === 'all';
            return handled(
                new ContinuedEvent(
                    all ? DEFAULT_THREAD_ID : threadId(record.results),
                    all
                )
            );
        }
        case 'stopped':
            return translateStopped(record.results);
        default:
            return unhandled(record);
    }
}

function translateBreakpoint(
    record: MIAsyncRecord,
    reason: 'new' | 'changed'
): TranslatedRecord {
    const bkpt = getTuple(record.results, 'bkpt');
    if (!bkpt) {
        return unhandled(record);
    }
    const info = toBreakpointInfo(bkpt);
    // Temporary breakpoints, such as the one run --start sets on main
    if (info.disp === 'del') {
        return handled();
    }
    return handled(new BreakpointEvent(reason, toDapBreakpoint(info)));
}

function translateModule(
    record: MIAsyncRecord,
    reason: 'new' | 'removed'
): TranslatedRecord {
    const id = getString(record.results, 'id') ?? '';
    const path = getString(record.results, 'target-name') ?? id;
    const module: DebugProtocol.Module = new Module(id, basename(path));
    module.path = path;
    return handled(new ModuleEvent(reason, module));
}

function translateNotify(record: MIAsyncRecord): TranslatedRecord {
    const results = record.results;
    switch (record.asyncClass) {
        case 'breakpoint-created':
            return translateBreakpoint(record, 'new');
        case 'breakpoint-modified':
            return translateBreakpoint(record, 'changed');
        case 'breakpoint-deleted': {
            const id = getNumber(results, 'id');
            return id === undefined
                ? unhandled(record)
                : handled(
                      new BreakpointEvent('removed', { id, verified: false })
                  );
        }
        case 'thread-created':
        case 'thread-exited': {
            const id = getNumber(results, 'id');
            return id === undefined
                ? unhandled(record)
                : handled(
                      new ThreadEvent(
                          record.asyncClass === 'thread-created'
                              ? 'started'
                              : 'exited',
                          id
                      )
                  );
        }
        case 'library-loaded':
            return translateModule(record, 'new');
        case 'library-unloaded':
            return translateModule(record, 'removed');
        default:
            return QUIET_NOTIFICATIONS.has(record.asyncClass)
                ? handled()
                : unhandled(record);
    }
}

/**
 * Map one MI async record to the DAP events it stands for. Session
 * state is not consulted or changed.
 */
export function translateAsyncRecord(record: MIAsyncRecord): TranslatedRecord {
    switch (record.kind) {
        case 'exec-async':
            return translateExec(record);
        case 'notify-async':
            return translateNotify(record);
        case 'status-async':
            return unhandled(record);
    }
}
