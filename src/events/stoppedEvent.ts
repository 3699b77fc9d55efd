/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { Event } from '@vscode/debugadapter';
import { DebugProtocol } from '@vscode/debugprotocol';

/**
 * Stopped event carrying the stop reason exactly as GDB reported it.
 */
export class StoppedEvent extends Event implements DebugProtocol.StoppedEvent {
    public body: {
        reason: string;
        threadId?: number;
        allThreadsStopped?: boolean;
        hitBreakpointIds?: number[];
    };

    constructor(
        reason: string,
        threadId: number,
        allThreadsStopped = false,
        hitBreakpointIds?: number[]
    ) {
        super('stopped');

        this.body = {
            reason,
            threadId,
            allThreadsStopped,
        };
        if (hitBreakpointIds?.length) {
            this.body.hitBreakpointIds = hitBreakpointIds;
        }
    }
}
