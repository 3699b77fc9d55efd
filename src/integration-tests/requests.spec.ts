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
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as sinon from 'sinon';
import { DebugProtocol } from '@vscode/debugprotocol';
import {
    ERROR_SESSION_NOT_STARTED,
    ERROR_UNKNOWN_REQUEST,
} from '../constants/session';
import { GDBDebugSession } from '../gdb/GDBDebugSession';
import { BridgeDebugClient } from './debugClient';
import { FakeProcessManager } from './mocks/fakeGdb';
import { expectRejection, waitFor } from './utils';

describe('request handling', function () {
    let dc: BridgeDebugClient;

    beforeEach(async function () {
        dc = new BridgeDebugClient();
        await dc.start();
    });

    afterEach(async function () {
        await dc.stop();
    });

    it('refuses requests before initialize', async function () {
        const err = await expectRejection(dc.threadsRequest());
        expect(err.message).to.eq(
            "Cannot handle 'threads' before the session is initialized"
        );
        expect(dc.processManager.starts).to.deep.equal([]);
    });

    it('refuses requests it does not support', async function () {
        const err = await expectRejection(
            dc.send('readMemory', { memoryReference: '0x1000', count: 4 })
        );
        expect(err.message).to.eq("Unsupported request 'readMemory'");
    });

    it('refuses inspection while the program runs', async function () {
        await dc.launchProgram();
        const err = await expectRejection(dc.threadsRequest());
        expect(err.message).to.eq(
            "Cannot handle 'threads' while the program is running"
        );
        expect(dc.commands('thread-info')).to.deep.equal([]);
    });

    it('handles one request at a time, in order', async function () {
        await dc.launchProgram();
        await dc.stopAt();
        dc.fake.expressions.set('count', '42');

        const [threads, stack, value] = await Promise.all([
            dc.threadsRequest(),
            dc.stackTraceRequest({ threadId: 1 }),
            dc.evaluateRequest({ expression: 'count' }),
        ]);

        expect(threads.body.threads).to.have.length(1);
        expect(stack.body.totalFrames).to.eq(3);
        expect(value.body.result).to.eq('42');
        expect(dc.fake.maxInFlight).to.eq(1);
        expect(dc.commands().slice(-3)).to.deep.equal([
            'thread-info',
            'stack-list-frames --thread 1',
            'data-evaluate-expression "count"',
        ]);
    });
});

describe('source', function () {
    let dc: BridgeDebugClient;
    let dir: string;

    before(function () {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mi-dap-bridge-'));
        fs.writeFileSync(
            path.join(dir, 'main.c'),
            'int main(void)\n{\n    return 0;\n}\n'
        );
    });

    after(function () {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    beforeEach(async function () {
        dc = new BridgeDebugClient();
        await dc.start();
        await dc.initialize();
    });

    afterEach(async function () {
        await dc.stop();
    });

    it('returns the content of a source file', async function () {
        const response = await dc.send('source', {
            source: { path: path.join(dir, 'main.c') },
            sourceReference: 0,
        });
        expect(response.body).to.deep.equal({
            content: 'int main(void)\n{\n    return 0;\n}\n',
        });
    });

    it('fails for a file that does not exist', async function () {
        const missing = path.join(dir, 'missing.c');
        const err = await expectRejection(
            dc.send('source', { source: { path: missing }, sourceReference: 0 })
        );
        expect(err.message).to.eq(`Source file not found: ${missing}`);
    });

    it('fails without a source path', async function () {
        const err = await expectRejection(
            dc.send('source', { sourceReference: 7 })
        );
        expect(err.message).to.eq('Source request needs a source path');
    });
});

describe('request failures', function () {
    let session: GDBDebugSession;
    let sendResponse: sinon.SinonSpy<[DebugProtocol.Response], void>;

    beforeEach(function () {
        session = new GDBDebugSession({
            gdbPath: 'gdb',
            programPath: '/src/demo',
            name: 'failures',
            processManager: new FakeProcessManager(),
        });
        sendResponse = sinon.spy(session, 'sendResponse');
    });

    afterEach(async function () {
        sinon.restore();
        await session.close();
    });

    async function request(
        command: string,
        args?: object
    ): Promise<DebugProtocol.Response> {
        const message: DebugProtocol.Request = {
            seq: sendResponse.callCount + 1,
            type: 'request',
            command,
            arguments: args,
        };
        const before = sendResponse.callCount;
        session.handleMessage(message);
        await waitFor(() => sendResponse.callCount > before);
        return sendResponse.lastCall.args[0];
    }

    it('carries the error id of an unknown request', async function () {
        const response = await request('restartFrame', { frameId: 1 });
        expect(response.success).to.eq(false);
        expect(response.command).to.eq('restartFrame');
        expect(response.message).to.eq("Unsupported request 'restartFrame'");
        expect(response.body.error.id).to.eq(ERROR_UNKNOWN_REQUEST);
    });

    it('carries the error id of a request before initialize', async function () {
        const response = await request('stackTrace', { threadId: 1 });
        expect(response.success).to.eq(false);
        expect(response.body.error.id).to.eq(ERROR_SESSION_NOT_STARTED);
    });

    it('launches when the client sends no arguments', async function () {
        const initialize = await request('initialize', { adapterID: 'gdb' });
        expect(initialize.success).to.eq(true);
        const launch = await request('launch');
        expect(launch.command).to.eq('launch');
        expect(launch.success).to.eq(true);
    });

    it('resolves closed with 0 once closed', async function () {
        await session.close();
        expect(await session.closed).to.eq(0);
        expect(session.sessionState).to.eq('terminated');
    });
});
