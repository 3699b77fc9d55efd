/*********************************************************************
 * Copyright (c) 2025 Arm Ltd. and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import {
    ERROR_GDB_COMMAND,
    ERROR_LAUNCH_FAILURE,
    ERROR_PROCESS_EXITED,
    ERROR_SESSION_BUSY,
    ERROR_SESSION_NOT_STARTED,
    ERROR_SESSION_TERMINATED,
    ERROR_UNKNOWN_REQUEST,
} from '../constants/session';

export class BridgeError extends Error {
    /** Error id reported to the client in failed responses. */
    public readonly code: number = ERROR_GDB_COMMAND;

    constructor(message: string, name: string = 'BridgeError') {
        super(message);
        this.name = name;
    }
}

/**
 * An MI output line whose nested structure could not be parsed.
 */
export class MalformedRecord extends BridgeError {
    constructor(
        public readonly line: string,
        reason: string
    ) {
        super(`Malformed MI record (${reason}): ${line}`, 'MalformedRecord');
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class LaunchFailure extends BridgeError {
    public readonly code = ERROR_LAUNCH_FAILURE;

    constructor(message: string) {
        super(message, 'LaunchFailure');
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ProcessTerminated extends BridgeError {
    public readonly code = ERROR_PROCESS_EXITED;

    constructor(message = 'GDB process has already exited') {
        super(message, 'ProcessTerminated');
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ProcessExited extends BridgeError {
    public readonly code = ERROR_PROCESS_EXITED;

    constructor(
        public readonly exitCode: number | null,
        public readonly signal: NodeJS.Signals | null = null
    ) {
        super(
            signal
                ? `GDB exited with signal ${signal}`
                : `GDB exited with code ${exitCode}`,
            'ProcessExited'
        );
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * An MI `^error` result.
 */
export class GDBError extends BridgeError {
    constructor(
        message: string,
        public readonly command: string,
        public readonly miCode?: string
    ) {
        super(message, 'GDBError');
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class SessionBusy extends BridgeError {
    public readonly code = ERROR_SESSION_BUSY;

    constructor(command: string) {
        super(
            `Cannot handle '${command}' while the program is running`,
            'SessionBusy'
        );
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class SessionNotStarted extends BridgeError {
    public readonly code = ERROR_SESSION_NOT_STARTED;

    constructor(command: string) {
        super(
            `Cannot handle '${command}' before the session is initialized`,
            'SessionNotStarted'
        );
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class SessionTerminated extends BridgeError {
    public readonly code = ERROR_SESSION_TERMINATED;

    constructor(command: string) {
        super(
            `Cannot handle '${command}', the debug session has terminated`,
            'SessionTerminated'
        );
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class UnknownRequest extends BridgeError {
    public readonly code = ERROR_UNKNOWN_REQUEST;

    constructor(command: string) {
        super(`Unsupported request '${command}'`, 'UnknownRequest');
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): number {
    return err instanceof BridgeError ? err.code : ERROR_GDB_COMMAND;
}
