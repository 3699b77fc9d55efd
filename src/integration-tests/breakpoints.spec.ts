/*********************************************************************
 * Copyright (c) 2019 Arm and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

import { expect } from 'chai';
import { BridgeDebugClient } from './debugClient';
import { expectRejection } from './utils';

const source = { name: 'main.c', path: '/src/main.c' };

describe('breakpoints', function () {
    let dc: BridgeDebugClient;

    beforeEach(async function () {
        dc = new BridgeDebugClient();
        await dc.start();
        await dc.initialize();
    });

    afterEach(async function () {
        await dc.stop();
    });

    it('replaces the breakpoints of a source as a whole', async function () {
        const first = await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [{ line: 5 }, { line: 6 }],
        });
        expect(first.body.breakpoints.map((bp) => bp.id)).to.deep.equal([
            1, 2,
        ]);

        const second = await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [{ line: 6 }, { line: 9, condition: 'i > 3' }],
        });
        expect(second.body.breakpoints).to.deep.equal([
            { verified: true, id: 2, line: 6, source },
            { verified: true, id: 3, line: 9, source },
        ]);

        await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [],
        });
        expect(dc.commands('break-')).to.deep.equal([
            'break-insert --source "/src/main.c" --line 5',
            'break-insert --source "/src/main.c" --line 6',
            'break-delete 1',
            'break-insert -c "i > 3" --source "/src/main.c" --line 9',
            'break-delete 2 3',
        ]);
        expect(dc.fake.breakpoints).to.deep.equal([]);
    });

    it('reports a location GDB refuses as unverified', async function () {
        dc.fake.badLines.add(7);
        const response = await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [{ line: 5 }, { line: 7 }],
        });
        expect(response.body.breakpoints).to.deep.equal([
            { verified: true, id: 1, line: 5, source },
            {
                verified: false,
                line: 7,
                source,
                message: 'No line 7 in file "/src/main.c".',
            },
        ]);
    });

    it('turns hit conditions into ignore counts', async function () {
        const response = await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [
                { line: 5, hitCondition: '3' },
                { line: 6, hitCondition: '> 2' },
                { line: 7, hitCondition: 'often' },
            ],
        });
        expect(dc.commands('break-')).to.deep.equal([
            'break-insert -t -i 2 --source "/src/main.c" --line 5',
            'break-insert -i 2 --source "/src/main.c" --line 6',
        ]);
        expect(response.body.breakpoints[2]).to.deep.equal({
            verified: false,
            line: 7,
            source,
            message: 'Unable to decode expression: often',
        });
    });

    it('needs a source path', async function () {
        const err = await expectRejection(
            dc.setBreakpointsRequest({
                source: { name: 'main.c' },
                breakpoints: [{ line: 5 }],
            })
        );
        expect(err.message).to.eq('Breakpoints need a source path');
    });

    it('can be set while the program runs', async function () {
        await dc.launchRequest({});
        await dc.configurationDoneRequest();
        expect(dc.session.sessionState).to.eq('running');

        const response = await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [{ line: 12 }],
        });
        expect(response.body.breakpoints).to.deep.equal([
            { verified: true, id: 1, line: 12, source },
        ]);
    });

    it('forwards breakpoint changes GDB reports', async function () {
        await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [{ line: 5 }],
        });

        const changed = dc.waitForEvent('breakpoint');
        dc.fake.emitRecords(
            '=breakpoint-modified,bkpt={number="1",type="breakpoint",disp="keep",enabled="y",addr="0x0000000000401136",func="main",file="main.c",fullname="/src/main.c",line="5",thread-groups=["i1"],times="1"}'
        );
        expect((await changed).body).to.deep.equal({
            reason: 'changed',
            breakpoint: { id: 1, verified: true, source, line: 5 },
        });

        const removed = dc.waitForEvent('breakpoint');
        dc.fake.emitRecords('=breakpoint-deleted,id="1"');
        expect((await removed).body).to.deep.equal({
            reason: 'removed',
            breakpoint: { id: 1, verified: false },
        });

        // GDB no longer has it, so asking again inserts it again
        await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [{ line: 5 }],
        });
        expect(dc.commands('break-')).to.deep.equal([
            'break-insert --source "/src/main.c" --line 5',
            'break-insert --source "/src/main.c" --line 5',
        ]);
    });

    it('lists the lines a breakpoint can go on', async function () {
        const response = await dc.send('breakpointLocations', {
            source: { path: '/src/main.c' },
            line: 5,
            endLine: 6,
        });
        expect(response.body.breakpoints).to.deep.equal([
            { line: 5 },
            { line: 6 },
        ]);
        expect(dc.commands('symbol-list-lines')).to.deep.equal([
            'symbol-list-lines "/src/main.c"',
        ]);
    });
});

describe('function breakpoints', function () {
    let dc: BridgeDebugClient;

    beforeEach(async function () {
        dc = new BridgeDebugClient();
        await dc.start();
        await dc.initialize();
    });

    afterEach(async function () {
        await dc.stop();
    });

    it('sets and clears function breakpoints', async function () {
        const response = await dc.setFunctionBreakpointsRequest({
            breakpoints: [{ name: 'add' }],
        });
        expect(response.body.breakpoints).to.deep.equal([
            { verified: true, id: 1, line: 3 },
        ]);

        const again = await dc.setFunctionBreakpointsRequest({
            breakpoints: [{ name: 'add' }],
        });
        expect(again.body.breakpoints).to.deep.equal([
            { verified: true, id: 1, line: 3 },
        ]);

        await dc.setFunctionBreakpointsRequest({ breakpoints: [] });
        expect(dc.commands('break-')).to.deep.equal([
            'break-insert --function "add"',
            'break-delete 1',
        ]);
    });

    it('keeps source and function breakpoints apart', async function () {
        await dc.setBreakpointsRequest({
            source: { path: '/src/main.c' },
            breakpoints: [{ line: 5 }],
        });
        await dc.setFunctionBreakpointsRequest({
            breakpoints: [{ name: 'add', condition: 'a == 2' }],
        });
        await dc.setFunctionBreakpointsRequest({ breakpoints: [] });
        expect(dc.commands('break-')).to.deep.equal([
            'break-insert --source "/src/main.c" --line 5',
            'break-insert -c "a == 2" --function "add"',
            'break-delete 2',
        ]);
    });
});
