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

function threadArgs(threadId?: number): MIArgument[] {
    return threadId !== undefined ? [opt('thread', threadId)] : [];
}

export function sendExecArguments(
    gdb: IGDBBackend,
    params: {
        arguments: string;
    }
): Promise<MITuple> {
    return gdb.sendCommand('exec-arguments', [params.arguments]);
}

/**
 * Start the program. With `start` GDB stops at the beginning of main.
 */
export function sendExecRun(
    gdb: IGDBBackend,
    params?: { start?: boolean }
): Promise<MITuple> {
    return gdb.sendCommand('exec-run', params?.start ? [opt('start')] : []);
}

export function sendExecContinue(
    gdb: IGDBBackend,
    threadId?: number
): Promise<MITuple> {
    return gdb.sendCommand('exec-continue', threadArgs(threadId));
}

export function sendExecNext(
    gdb: IGDBBackend,
    threadId?: number
): Promise<MITuple> {
    return gdb.sendCommand('exec-next', threadArgs(threadId));
}

export function sendExecNextInstruction(
    gdb: IGDBBackend,
    threadId?: number
): Promise<MITuple> {
    return gdb.sendCommand('exec-next-instruction', threadArgs(threadId));
}

export function sendExecStep(
    gdb: IGDBBackend,
    threadId?: number
): Promise<MITuple> {
    return gdb.sendCommand('exec-step', threadArgs(threadId));
}

export function sendExecStepInstruction(
    gdb: IGDBBackend,
    threadId?: number
): Promise<MITuple> {
    return gdb.sendCommand('exec-step-instruction', threadArgs(threadId));
}

export function sendExecFinish(
    gdb: IGDBBackend,
    frameRef: FrameReference
): Promise<MITuple> {
    return gdb.sendCommand('exec-finish', [
        opt('thread', frameRef.threadId),
        opt('frame', frameRef.frameId),
    ]);
}

export function sendExecInterrupt(
    gdb: IGDBBackend,
    threadId?: number
): Promise<MITuple> {
    return gdb.sendCommand(
        'exec-interrupt',
        threadId !== undefined ? threadArgs(threadId) : [opt('all')]
    );
}
