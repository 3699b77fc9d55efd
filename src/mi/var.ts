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
import { getString, getTuples, MIArgument, MITuple, opt } from './base';

export interface MIVarCreateResponse {
    name: string;
    numchild: string;
    value: string;
    type: string;
}

export interface MIVarChild {
    name: string;
    exp: string;
    numchild: string;
    type: string;
    value?: string;
}

export interface MIVarListChildrenResponse {
    numchild: string;
    children: MIVarChild[];
}

export async function sendVarCreate(
    gdb: IGDBBackend,
    params: {
        expression: string;
        frameRef?: FrameReference;
    }
): Promise<MIVarCreateResponse> {
    const args: MIArgument[] = [];
    if (params.frameRef) {
        args.push(
            opt('thread', params.frameRef.threadId),
            opt('frame', params.frameRef.frameId)
        );
    }
    // GDB picks the name, in the frame selected above
    args.push('-', '*', params.expression);

    const results = await gdb.sendCommand('var-create', args);
    return {
        name: getString(results, 'name') ?? '',
        numchild: getString(results, 'numchild') ?? '0',
        value: getString(results, 'value') ?? '',
        type: getString(results, 'type') ?? '',
    };
}

export async function sendVarListChildren(
    gdb: IGDBBackend,
    params: {
        name: string;
    }
): Promise<MIVarListChildrenResponse> {
    const results = await gdb.sendCommand('var-list-children', [
        opt('all-values'),
        params.name,
    ]);
    return {
        numchild: getString(results, 'numchild') ?? '0',
        children: getTuples(results, 'children').map((child) => ({
            name: getString(child, 'name') ?? '',
            exp: getString(child, 'exp') ?? '',
            numchild: getString(child, 'numchild') ?? '0',
            type: getString(child, 'type') ?? '',
            value: getString(child, 'value'),
        })),
    };
}

export function sendVarDelete(
    gdb: IGDBBackend,
    params: {
        varname: string;
    }
): Promise<MITuple> {
    return gdb.sendCommand('var-delete', [params.varname]);
}
