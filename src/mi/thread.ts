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
    getString,
    getTuple,
    getTuples,
    MIThreadInfo,
    toFrameInfo,
} from './base';

export interface MIThreadInfoResponse {
    threads: MIThreadInfo[];
}

export async function sendThreadInfoRequest(
    gdb: IGDBBackend,
    params: {
        threadId?: string;
    }
): Promise<MIThreadInfoResponse> {
    const results = await gdb.sendCommand(
        'thread-info',
        params.threadId !== undefined ? [params.threadId] : []
    );
    const threads = getTuples(results, 'threads').map((thread) => {
        const frame = getTuple(thread, 'frame');
        return {
            id: getString(thread, 'id') ?? '',
            targetId: getString(thread, 'target-id') ?? '',
            name: getString(thread, 'name'),
            details: getString(thread, 'details'),
            state: getString(thread, 'state'),
            frame: frame ? toFrameInfo(frame) : undefined,
        };
    });
    return { threads };
}
