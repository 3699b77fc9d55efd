/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { Readable, Writable } from 'stream';
import { DebugProtocol } from '@vscode/debugprotocol';
import { GDBDebugSession } from '../gdb/GDBDebugSession';
import { errorMessage } from '../gdb/errors';
import { NamedLogger } from '../namedLogger';

/**
 * One DAP client connection. The framing is the debug adapter
 * library's own; this ties the life of the session to the streams, so
 * the session ends with its input or when either stream fails.
 */
export class DAPTransport {
    protected closed = false;
    protected readonly logger: NamedLogger;

    constructor(
        protected readonly session: GDBDebugSession,
        protected readonly input: Readable,
        protected readonly output: Writable,
        name?: string
    ) {
        this.logger = new NamedLogger(name, session.logSink);
    }

    public start() {
        // Registered ahead of the session's listeners, so nothing more
        // is written to a stream that failed
        this.input.on('error', () => this.close());
        this.output.on('error', () => this.close());
        this.session.on('close', () => this.close());
        // Malformed messages are reported here, the connection lives on
        this.session.on('error', (event: DebugProtocol.Event) => {
            this.logger.error(`DAP connection error: ${event.body}`);
        });
        this.session.start(this.input, this.output);
    }

    public close() {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.session
            .close()
            .catch((err) =>
                this.logger.error(
                    `Failed to close session: ${errorMessage(err)}`
                )
            );
    }
}
