/*********************************************************************
 * Copyright (c) 2025 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

/**
 * Error ids carried in the `body.error.id` of failed responses.
 */
export const ERROR_GDB_COMMAND = 100;
export const ERROR_LAUNCH_FAILURE = 101;
export const ERROR_PROCESS_EXITED = 102;
export const ERROR_SESSION_BUSY = 103;
export const ERROR_SESSION_NOT_STARTED = 104;
export const ERROR_SESSION_TERMINATED = 105;
export const ERROR_UNKNOWN_REQUEST = 106;

/**
 * Requests handled by the session. Anything else is answered with an
 * unknown request failure.
 */
export const SUPPORTED_REQUESTS: ReadonlySet<string> = new Set([
    'initialize',
    'launch',
    'attach',
    'configurationDone',
    'setBreakpoints',
    'setFunctionBreakpoints',
    'breakpointLocations',
    'continue',
    'next',
    'stepIn',
    'stepOut',
    'pause',
    'threads',
    'stackTrace',
    'scopes',
    'variables',
    'evaluate',
    'source',
    'disconnect',
]);

/**
 * Requests that read inferior state and so need it to be stopped.
 */
export const INSPECTION_REQUESTS: ReadonlySet<string> = new Set([
    'threads',
    'stackTrace',
    'scopes',
    'variables',
    'evaluate',
]);

/**
 * Requests that resume the inferior.
 */
export const EXECUTION_REQUESTS: ReadonlySet<string> = new Set([
    'continue',
    'next',
    'stepIn',
    'stepOut',
]);

/** Grace period between SIGTERM and SIGKILL when stopping GDB. */
export const DEFAULT_STOP_TIMEOUT = 2000;

/** How long GDB's stdout may stay open after GDB itself exited. */
export const STDOUT_DRAIN_TIMEOUT = 1000;
