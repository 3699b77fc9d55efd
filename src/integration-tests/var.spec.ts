/*********************************************************************
 * Copyright (c) 2018 Ericsson and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

import { expect } from 'chai';
import { DebugProtocol } from '@vscode/debugprotocol';
import { BridgeDebugClient } from './debugClient';
import { expectRejection } from './utils';

describe('Variables Test Suite', function () {
    let dc: BridgeDebugClient;

    async function topScopes(): Promise<DebugProtocol.Scope[]> {
        const stack = await dc.stackTraceRequest({ threadId: 1 });
        const scopes = await dc.scopesRequest({
            frameId: stack.body.stackFrames[0].id,
        });
        return scopes.body.scopes;
    }

    beforeEach(async function () {
        dc = new BridgeDebugClient();
        await dc.start();
        await dc.launchProgram();
        await dc.stopAt();
    });

    afterEach(async function () {
        await dc.stop();
    });

    it('describes the frames of the stopped thread', async function () {
        const stack = await dc.stackTraceRequest({ threadId: 1 });
        const frames = stack.body.stackFrames;
        expect(frames.map((frame) => frame.name)).to.deep.equal([
            'add',
            'main',
            '__libc_start_call_main',
        ]);
        expect(frames.map((frame) => frame.line)).to.deep.equal([5, 12, 0]);
        expect(frames[0].source).to.deep.include({
            name: 'main.c',
            path: '/src/main.c',
        });
        expect(frames[0].instructionPointerReference).to.eq(
            '0x0000000000401136'
        );
        expect(frames[2].source).to.eq(undefined);

        const page = await dc.stackTraceRequest({
            threadId: 1,
            startFrame: 1,
            levels: 1,
        });
        expect(page.body.stackFrames.map((frame) => frame.name)).to.deep.equal(
            ['main']
        );
        expect(page.body.totalFrames).to.eq(3);
        expect(dc.commands('stack-list-frames')).to.deep.equal([
            'stack-list-frames --thread 1',
        ]);
    });

    it('offers locals and registers for a frame', async function () {
        const scopes = await topScopes();
        expect(scopes.map((scope) => scope.name)).to.deep.equal([
            'Local',
            'Registers',
        ]);
        expect(scopes.map((scope) => scope.expensive)).to.deep.equal([
            false,
            true,
        ]);
    });

    it('lists locals, expanding structures through a variable object', async function () {
        const [local] = await topScopes();
        const vars = await dc.variablesRequest({
            variablesReference: local.variablesReference,
        });
        const [count, origin] = vars.body.variables;
        expect(count).to.deep.equal({
            name: 'count',
            value: '42',
            type: 'int',
            variablesReference: 0,
        });
        expect(origin.name).to.eq('origin');
        expect(origin.value).to.eq('{...}');
        expect(origin.type).to.eq('struct point');
        expect(origin.variablesReference).to.be.greaterThan(0);

        const children = await dc.variablesRequest({
            variablesReference: origin.variablesReference,
        });
        expect(children.body.variables).to.deep.equal([
            { name: 'x', value: '1', type: 'int', variablesReference: 0 },
            { name: 'y', value: '2', type: 'int', variablesReference: 0 },
        ]);
        expect(
            dc.commands().filter((text) => text.startsWith('var-'))
        ).to.deep.equal([
            'var-create --thread 1 --frame 0 "-" "*" "origin"',
            'var-list-children --all-values "var1"',
        ]);
    });

    it('reads registers by name', async function () {
        const [, registers] = await topScopes();
        const vars = await dc.variablesRequest({
            variablesReference: registers.variablesReference,
        });
        expect(vars.body.variables).to.deep.equal([
            { name: 'rax', value: '0x2a', variablesReference: 0 },
            { name: 'rbx', value: '0x0', variablesReference: 0 },
            { name: 'rip', value: '0x401136', variablesReference: 0 },
        ]);
        expect(dc.commands('data-list-register')).to.deep.equal([
            'data-list-register-names --thread 1 --frame 0',
            'data-list-register-values --thread 1 --frame 0 "x"',
        ]);
    });

    it('serves threads from the cache until the program moves', async function () {
        await dc.threadsRequest();
        await dc.threadsRequest();
        expect(dc.commands('thread-info')).to.have.length(1);

        await dc.continueRequest({ threadId: 1 });
        await dc.stopAt();
        await dc.threadsRequest();
        expect(dc.commands('thread-info')).to.have.length(2);
    });

    it('forgets frame ids once the program moves', async function () {
        const stack = await dc.stackTraceRequest({ threadId: 1 });
        const frameId = stack.body.stackFrames[0].id;

        await dc.continueRequest({ threadId: 1 });
        await dc.stopAt();
        const err = await expectRejection(dc.scopesRequest({ frameId }));
        expect(err.message).to.eq(`Unknown frame id ${frameId}`);
    });

    it('deletes variable objects before the first request after a stop', async function () {
        const [local] = await topScopes();
        await dc.variablesRequest({
            variablesReference: local.variablesReference,
        });

        await dc.continueRequest({ threadId: 1 });
        await dc.stopAt();
        await dc.threadsRequest();

        const texts = dc.commands();
        expect(texts.slice(texts.indexOf('exec-continue') + 1)).to.deep.equal(
            ['var-delete "var1"', 'thread-info']
        );
    });

    it('rejects an unknown variables reference', async function () {
        const err = await expectRejection(
            dc.variablesRequest({ variablesReference: 4242 })
        );
        expect(err.message).to.eq('Unknown variables reference 4242');
    });
});
