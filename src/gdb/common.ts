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
import { MIThreadInfo } from '../mi/base';

export class GDBThread implements DebugProtocol.Thread {
    constructor(public id: number, public name: string) {}

    /**
     * GDB threads without a name of their own are shown by target id,
     * e.g. `Thread 0x7ffff7d8a740 (LWP 4242)`.
     */
    static fromMI(thread: MIThreadInfo): GDBThread {
        const id = parseInt(thread.id, 10);
        return new GDBThread(
            id,
            thread.name || thread.targetId || `Thread ${id}`
        );
    }
}
