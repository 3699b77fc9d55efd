/*********************************************************************
 * Copyright (c) 2018 Ericsson and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { IGDBBackend } from '../types/gdb';
import { FrameReference } from '../types/session';
import {
    getNumber,
    getString,
    getStrings,
    getTuples,
    MIArgument,
    opt,
} from './base';

export interface MIRegisterValueInfo {
    number: number;
    value: string;
}

function frameArgs(frameRef?: FrameReference): MIArgument[] {
    return frameRef
        ? [opt('thread', frameRef.threadId), opt('frame', frameRef.frameId)]
        : [];
}

export async function sendDataEvaluateExpression(
    gdb: IGDBBackend,
    expr: string,
    frameRef?: FrameReference
): Promise<{ value?: string }> {
    const results = await gdb.sendCommand('data-evaluate-expression', [
        ...frameArgs(frameRef),
        expr,
    ]);
    return { value: getString(results, 'value') };
}

/**
 * Register names by register number. Numbers GDB has no register for
 * map to an empty name.
 */
export async function sendDataListRegisterNames(
    gdb: IGDBBackend,
    frameRef?: FrameReference
): Promise<string[]> {
    const results = await gdb.sendCommand(
        'data-list-register-names',
        frameArgs(frameRef)
    );
    return getStrings(results, 'register-names');
}

export async function sendDataListRegisterValues(
    gdb: IGDBBackend,
    params: {
        fmt: 'x' | 'N';
        frameRef?: FrameReference;
    }
): Promise<MIRegisterValueInfo[]> {
    const results = await gdb.sendCommand('data-list-register-values', [
        ...frameArgs(params.frameRef),
        params.fmt,
    ]);
    return getTuples(results, 'register-values').map((register) => ({
        number: getNumber(register, 'number') ?? -1,
        value: getString(register, 'value') ?? '',
    }));
}
