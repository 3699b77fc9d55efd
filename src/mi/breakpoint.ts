/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { IGDBBackend } from '../types/gdb';
import {
    getTuples,
    MIArgument,
    MIBreakpointInfo,
    MITuple,
    opt,
    toBreakpointInfo,
} from './base';

export interface MIBreakInsertResponse {
    bkpt: MIBreakpointInfo;
}

export interface MIBreakpointInsertOptions {
    temporary?: boolean;
    condition?: string;
    ignoreCount?: number;
}

export function sourceBreakpointLocation(
    source: string,
    line: number
): MIArgument[] {
    return [opt('source', source), opt('line', line)];
}

export function functionBreakpointLocation(fn: string): MIArgument[] {
    return [opt('function', fn)];
}

export async function sendBreakpointInsert(
    gdb: IGDBBackend,
    location: MIArgument[],
    options?: MIBreakpointInsertOptions
): Promise<MIBreakInsertResponse> {
    const args: MIArgument[] = [];
    if (options?.temporary) {
        args.push(opt('t'));
    }
    if (options?.condition) {
        args.push(opt('c', options.condition));
    }
    if (options?.ignoreCount) {
        args.push(opt('i', options.ignoreCount));
    }
    const results = await gdb.sendCommand('break-insert', [
        ...args,
        ...location,
    ]);
    // Every location of a multi-location breakpoint shares its number
    const [bkpt] = getTuples(results, 'bkpt');
    if (!bkpt) {
        throw new Error('GDB did not report the inserted breakpoint');
    }
    return { bkpt: toBreakpointInfo(bkpt) };
}

export function sendBreakDelete(
    gdb: IGDBBackend,
    request: {
        breakpoints: number[];
    }
): Promise<MITuple> {
    return gdb.sendCommand('break-delete', request.breakpoints);
}
