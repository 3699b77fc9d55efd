/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

export * from './mi';
export * from './MIParser';
export * from './types/gdb';
export * from './types/session';
export * from './gdb/errors';
export * from './gdb/GDBBackend';
export * from './gdb/GDBDebugSession';
export * from './events/eventTranslator';
export * from './processManagers/GDBProcess';
export * from './processManagers/GDBFileSystemProcessManager';
export * from './transport/DAPTransport';
export { connectSession, createSession, processArgv } from './debugAdapter';
export type { AdapterArguments } from './debugAdapter';
