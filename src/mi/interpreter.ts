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
import { MIArgument, MITuple, opt } from './base';

export function sendInterpreterExecConsole(
    gdb: IGDBBackend,
    params: {
        frameRef: FrameReference | undefined;
        command: string;
    }
): Promise<MITuple> {
    // Omitting --thread/--frame means the current thread and frame
    const args: MIArgument[] = [];
    if (params.frameRef) {
        args.push(
            opt('thread', params.frameRef.threadId),
            opt('frame', params.frameRef.frameId)
        );
    }
    args.push('console', params.command);
    return gdb.sendCommand('interpreter-exec', args);
}
