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
import { FrameReference } from '../types/session';
import {
    getTuples,
    MIArgument,
    MIFrameInfo,
    MIVariableInfo,
    opt,
    toFrameInfo,
    toVariableInfo,
} from './base';

export async function sendStackListFramesRequest(
    gdb: IGDBBackend,
    params: {
        threadId?: number;
    }
): Promise<{
    stack: MIFrameInfo[];
}> {
    const args: MIArgument[] = [];
    if (params.threadId !== undefined) {
        args.push(opt('thread', params.threadId));
    }
    const results = await gdb.sendCommand('stack-list-frames', args);
    return { stack: getTuples(results, 'stack').map(toFrameInfo) };
}

export async function sendStackListVariables(
    gdb: IGDBBackend,
    params: {
        frameRef: FrameReference | undefined;
        printValues: 'no-values' | 'all-values' | 'simple-values';
    }
): Promise<{
    variables: MIVariableInfo[];
}> {
    const args: MIArgument[] = [];
    if (params.frameRef?.threadId !== undefined) {
        args.push(opt('thread', params.frameRef.threadId));
    }
    if (params.frameRef?.frameId !== undefined) {
        args.push(opt('frame', params.frameRef.frameId));
    }
    args.push(opt(params.printValues));

    const results = await gdb.sendCommand('stack-list-variables', args);
    return {
        variables: getTuples(results, 'variables').map(toVariableInfo),
    };
}
