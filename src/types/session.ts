/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { DebugProtocol } from '@vscode/debugprotocol';

export interface LaunchRequestArguments
    extends DebugProtocol.LaunchRequestArguments {
    /** Command line of the program, passed to `-exec-arguments`. */
    arguments?: string;
    /** Stop at the beginning of main instead of running freely. */
    stopOnEntry?: boolean;
    verbose?: boolean;
    logFile?: string;
    /** MI or CLI commands run after GDB is set up, before the program runs. */
    initCommands?: string[];
}

export interface AttachRequestArguments
    extends DebugProtocol.AttachRequestArguments {
    /** Process GDB attaches to, instead of running the program. */
    processId?: string | number;
    verbose?: boolean;
    logFile?: string;
    /** MI or CLI commands run before attaching. */
    initCommands?: string[];
}

/**
 * Where a session stands. The stop reason of the last stop is kept next
 * to it by the session.
 */
export type SessionState =
    | 'unstarted'
    | 'launching'
    | 'stopped'
    | 'running'
    | 'terminated';

export interface FrameReference {
    threadId: number;
    frameId: number;
}

export interface FrameVariableReference {
    type: 'frame';
    frameHandle: number;
}

export interface ObjectVariableReference {
    type: 'object';
    frameHandle: number;
    varobjName: string;
}

export interface RegisterVariableReference {
    type: 'registers';
    frameHandle: number;
}

export type VariableReference =
    | FrameVariableReference
    | ObjectVariableReference
    | RegisterVariableReference;
