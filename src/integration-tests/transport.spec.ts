/*********************************************************************
 * Copyright (c) 2025 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

import { expect } from 'chai';
import * as sinon from 'sinon';
import { PassThrough } from 'stream';
import { OutputEvent } from '@vscode/debugadapter';
import { logger } from '@vscode/debugadapter/lib/logger';
import { connectSession } from '../debugAdapter';
import { GDBDebugSession } from '../gdb/GDBDebugSession';
import { FakeProcessManager } from './mocks/fakeGdb';
import { delay, waitFor } from './utils';

interface SentMessage {
    seq: number;
    type: string;
    command?: string;
    request_seq?: number;
    success?: boolean;
    message?: string;
    event?: string;
    body?: { output?: string };
}

class LoggingSession extends GDBDebugSession {
    public warn(msg: string) {
        this.logger.warn(msg);
    }
}

function createSession(name?: string, runAsServer = false): LoggingSession {
    return new LoggingSession({
        gdbPath: 'gdb',
        programPath: '/src/demo',
        name,
        processManager: new FakeProcessManager(),
        runAsServer,
    });
}

/**
 * A client end of a session: writes framed requests and reads back
 * what the session framed.
 */
class Connection {
    public readonly input = new PassThrough();
    public readonly output = new PassThrough();
    protected data = Buffer.alloc(0);

    constructor() {
        this.output.on('data', (chunk: Buffer) => {
            this.data = Buffer.concat([this.data, chunk]);
        });
    }

    public connect(session: GDBDebugSession, name?: string) {
        connectSession(session, this.input, this.output, name);
    }

    public send(seq: number, command: string) {
        this.write(JSON.stringify({ seq, type: 'request', command }));
    }

    public write(body: string) {
        this.input.write(
            `Content-Length: ${Buffer.byteLength(body, 'utf8')}\r\n\r\n${body}`
        );
    }

    public messages(): SentMessage[] {
        const messages: SentMessage[] = [];
        let rest = this.data;
        for (;;) {
            const headerEnd = rest.indexOf('\r\n\r\n');
            if (headerEnd < 0) {
                return messages;
            }
            const header = rest.subarray(0, headerEnd).toString('ascii');
            const length = parseInt(
                /Content-Length: (\d+)/.exec(header)?.[1] ?? '0',
                10
            );
            const start = headerEnd + 4;
            messages.push(
                JSON.parse(rest.subarray(start, start + length).toString())
            );
            rest = rest.subarray(start + length);
        }
    }

    public responses(): SentMessage[] {
        return this.messages().filter((m) => m.type === 'response');
    }

    public outputs(): string[] {
        return this.messages()
            .filter((m) => m.event === 'output')
            .map((m) => m.body?.output ?? '');
    }
}

describe('DAP connection', function () {
    let session: LoggingSession;
    let conn: Connection;

    beforeEach(function () {
        session = createSession();
        conn = new Connection();
        conn.connect(session);
    });

    afterEach(async function () {
        sinon.restore();
        conn.input.end();
        await session.closed;
    });

    it('answers a framed request with a framed response', async function () {
        conn.send(1, 'threads');
        await waitFor(() => conn.responses().length === 1);
        expect(conn.responses()[0]).to.deep.include({
            type: 'response',
            request_seq: 1,
            command: 'threads',
            success: false,
            message:
                "Cannot handle 'threads' before the session is initialized",
        });
    });

    it('keeps serving after a body it cannot parse', async function () {
        const errorSpy = sinon.spy(logger, 'error');
        conn.write('{nope');
        conn.send(2, 'threads');
        await waitFor(() => conn.responses().length === 1);
        expect(conn.responses()[0].request_seq).to.eq(2);
        sinon.assert.calledOnce(errorSpy);
        sinon.assert.calledWithMatch(
            errorSpy,
            sinon.match(/^DAP connection error: /)
        );
    });

    it('closes the session when the input ends', async function () {
        conn.input.end();
        expect(await session.closed).to.eq(0);

        const sent = conn.messages().length;
        session.sendEvent(new OutputEvent('late\n'));
        await delay(10);
        expect(conn.messages()).to.have.length(sent);
    });

    it('closes the session when the output fails', async function () {
        conn.output.destroy(new Error('write EPIPE'));
        expect(await session.closed).to.eq(0);
        expect(session.sessionState).to.eq('terminated');
    });
});

describe('server sessions', function () {
    it('log to their own client only', async function () {
        const a = createSession('A', true);
        const b = createSession('B', true);
        const connA = new Connection();
        const connB = new Connection();
        connA.connect(a, 'A');
        connB.connect(b, 'B');
        try {
            a.warn('secret-of-A');
            await waitFor(() => connA.outputs().length === 1);
            await delay(10);
            expect(connA.outputs()).to.deep.equal(['[A] secret-of-A\n']);
            expect(connB.outputs()).to.deep.equal([]);
        } finally {
            connA.input.end();
            connB.input.end();
            await Promise.all([a.closed, b.closed]);
        }
    });
});
