/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { basename } from 'path';
import { DebugProtocol } from '@vscode/debugprotocol';
import { MIBreakpointInfo } from '../mi/base';

// Allow a single number for ignore count or the form '> [number]'
const ignoreCountRegex = /\s|>/g;

/**
 * A breakpoint as the client asked for it, plus what GDB made of it.
 * Unverified breakpoints have no GDB number.
 */
export interface BreakpointRecord {
    key: string;
    source?: string;
    functionName?: string;
    line?: number;
    condition?: string;
    hitCondition?: string;
    gdbId?: number;
    verified: boolean;
    hitCount: number;
    /** Line GDB put the breakpoint on, when it differs. */
    actualLine?: number;
    message?: string;
}

export interface HitCondition {
    ignoreCount: number;
    temporary: boolean;
}

/**
 * `N` stops on the Nth hit only, `> N` on every hit after the Nth.
 *
 * @returns undefined when the expression is not understood
 */
export function parseHitCondition(
    hitCondition: string
): HitCondition | undefined {
    const ignoreCount = parseInt(
        hitCondition.replace(ignoreCountRegex, ''),
        10
    );
    if (isNaN(ignoreCount)) {
        return undefined;
    }
    const temporary = !hitCondition.trim().startsWith('>');
    return {
        ignoreCount: temporary ? Math.max(ignoreCount - 1, 0) : ignoreCount,
        temporary,
    };
}

export function sourceBreakpointKey(
    bp: DebugProtocol.SourceBreakpoint
): string {
    return JSON.stringify([
        bp.line,
        bp.condition || '',
        bp.hitCondition || '',
    ]);
}

export function functionBreakpointKey(
    bp: DebugProtocol.FunctionBreakpoint
): string {
    return JSON.stringify([
        bp.name,
        bp.condition || '',
        bp.hitCondition || '',
    ]);
}

/**
 * Match the requested breakpoints against the installed ones.
 *
 * @returns resolved -> one entry per requested breakpoint, in order, with
 * the installed record it keeps (none when it needs inserting)
 * deletes -> installed records no requested breakpoint matches
 */
export function resolveBreakpoints<T>(
    requested: T[],
    installed: BreakpointRecord[],
    keyFn: (bp: T) => string
): {
    resolved: Array<{ bp: T; record?: BreakpointRecord }>;
    deletes: BreakpointRecord[];
} {
    const unmatched = [...installed];
    const resolved = requested.map((bp) => {
        const key = keyFn(bp);
        const index = unmatched.findIndex((record) => record.key === key);
        if (index < 0) {
            return { bp };
        }
        const [record] = unmatched.splice(index, 1);
        return { bp, record };
    });
    return { resolved, deletes: unmatched };
}

export function toDapBreakpoint(
    record: BreakpointRecord
): DebugProtocol.Breakpoint {
    const breakpoint: DebugProtocol.Breakpoint = { verified: record.verified };
    if (record.gdbId !== undefined) {
        breakpoint.id = record.gdbId;
    }
    const line = record.actualLine ?? record.line;
    if (line !== undefined) {
        breakpoint.line = line;
    }
    if (record.source) {
        breakpoint.source = {
            name: basename(record.source),
            path: record.source,
        };
    }
    if (record.message) {
        breakpoint.message = record.message;
    }
    return breakpoint;
}

/**
 * The breakpoints of one session: per source file plus the function
 * breakpoints, each set replaced as a whole by the client.
 */
export class BreakpointTable {
    protected readonly bySource = new Map<string, BreakpointRecord[]>();
    protected functions: BreakpointRecord[] = [];

    public getSource(source: string): BreakpointRecord[] {
        return this.bySource.get(source) ?? [];
    }

    public replaceSource(source: string, records: BreakpointRecord[]) {
        if (records.length) {
            this.bySource.set(source, records);
        } else {
            this.bySource.delete(source);
        }
    }

    public getFunctions(): BreakpointRecord[] {
        return this.functions;
    }

    public replaceFunctions(records: BreakpointRecord[]) {
        this.functions = records;
    }

    public all(): BreakpointRecord[] {
        return [...[...this.bySource.values()].flat(), ...this.functions];
    }

    public findByGdbId(gdbId: number): BreakpointRecord | undefined {
        return this.all().find((record) => record.gdbId === gdbId);
    }

    /**
     * Apply a `=breakpoint-modified` report.
     */
    public update(info: MIBreakpointInfo): BreakpointRecord | undefined {
        const record = this.findByGdbId(parseInt(info.number, 10));
        if (record) {
            record.hitCount = info.times;
            if (info.line !== undefined && info.line !== record.line) {
                record.actualLine = info.line;
            }
        }
        return record;
    }

    /**
     * Drop a breakpoint GDB deleted on its own, such as a temporary one
     * that was hit.
     */
    public remove(gdbId: number): boolean {
        const before = this.functions.length;
        this.functions = this.functions.filter(
            (record) => record.gdbId !== gdbId
        );
        let removed = this.functions.length !== before;
        for (const [source, records] of this.bySource) {
            const kept = records.filter((record) => record.gdbId !== gdbId);
            if (kept.length !== records.length) {
                removed = true;
                this.replaceSource(source, kept);
            }
        }
        return removed;
    }
}
