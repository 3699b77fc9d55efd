/*********************************************************************
 * Copyright (c) 2025 Arm Ltd. and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

/**
 * Command line GDB is started with, ahead of the program path.
 */
export const GDB_ARGUMENTS = ['--interpreter=mi3', '--nx', '--quiet'];

/**
 * MI commands run once GDB has printed its first prompt.
 */
export const STARTUP_COMMANDS: ReadonlyArray<{
    command: string;
    args: string[];
}> = [
    { command: 'gdb-set', args: ['mi-async', 'on'] },
    { command: 'gdb-set', args: ['confirm', 'off'] },
    { command: 'gdb-set', args: ['pagination', 'off'] },
    { command: 'enable-pretty-printing', args: [] },
];

/**
 * `*stopped` reasons reported when the inferior has gone away.
 */
export const EXIT_REASONS: ReadonlySet<string> = new Set([
    'exited',
    'exited-normally',
    'exited-signalled',
]);

/**
 * Notify async classes that need no event of their own.
 */
export const QUIET_NOTIFICATIONS: ReadonlySet<string> = new Set([
    'thread-group-added',
    'thread-group-removed',
    'thread-group-started',
    'thread-group-exited',
    'thread-selected',
    'cmd-param-changed',
]);

export const MI_PROMPT = '(gdb)';
