/*********************************************************************
 * Copyright (c) 2025 Arm Ltd. and others
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
import { logger } from '@vscode/debugadapter/lib/logger';
import { LaunchFailure, ProcessTerminated } from '../gdb/errors';
import { GDBFileSystemProcessManager } from '../processManagers/GDBFileSystemProcessManager';
import { GDBProcess } from '../processManagers/GDBProcess';
import { FakeGdb } from './mocks/fakeGdb';
import { expectRejection } from './utils';

describe('GDB file system process manager', function () {
    let dir: string;
    let program: string;

    before(function () {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mi-dap-bridge-'));
        program = path.join(dir, 'demo');
        fs.writeFileSync(program, '');
    });

    after(function () {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('fails when the GDB executable is missing', async function () {
        const manager = new GDBFileSystemProcessManager('test');
        const err = await expectRejection(
            manager.start('/nonexistent/gdb', program)
        );
        expect(err).to.be.an.instanceOf(LaunchFailure);
        expect(err.message).to.match(
            /^GDB executable \/nonexistent\/gdb is not usable: /
        );
    });

    it('fails when the GDB executable cannot be run', async function () {
        const gdb = path.join(dir, 'not-executable');
        fs.writeFileSync(gdb, '');
        fs.chmodSync(gdb, 0o644);
        const manager = new GDBFileSystemProcessManager('test');
        const err = await expectRejection(manager.start(gdb, program));
        expect(err).to.be.an.instanceOf(LaunchFailure);
        expect(err.message).to.match(/^GDB executable .* is not usable: /);
    });

    it('fails when the program is missing', async function () {
        const gdb = path.join(dir, 'gdb');
        fs.writeFileSync(gdb, '');
        fs.chmodSync(gdb, 0o755);
        const manager = new GDBFileSystemProcessManager('test');
        const err = await expectRejection(
            manager.start(gdb, path.join(dir, 'missing'))
        );
        expect(err).to.be.an.instanceOf(LaunchFailure);
        expect(err.message).to.match(/^Program .*missing is not usable: /);
    });
});

describe('GDB process', function () {
    let fake: FakeGdb;
    let proc: GDBProcess;

    beforeEach(async function () {
        fake = new FakeGdb();
        proc = new GDBProcess(fake, 'test');
        await proc.ready;
    });

    afterEach(async function () {
        sinon.restore();
        await proc.stop(10);
    });

    it('reads the output a line at a time', async function () {
        fake.stdout.write('~"one"\r\n~"two"\n');
        fake.exit(0);
        const lines: string[] = [];
        for await (const line of proc.lines()) {
            lines.push(line);
        }
        expect(lines).to.deep.equal([
            '=thread-group-added,id="i1"',
            '(gdb)',
            '~"one"',
            '~"two"',
        ]);
    });

    it('keeps reading stdout after GDB exited', async function () {
        fake.emit('exit', 0, null);
        expect((await proc.exited).exitCode).to.eq(0);
        fake.stdout.write('~"late"\n');
        fake.stdout.end();
        const lines: string[] = [];
        for await (const line of proc.lines()) {
            lines.push(line);
        }
        expect(lines).to.deep.equal([
            '=thread-group-added,id="i1"',
            '(gdb)',
            '~"late"',
        ]);
    });

    it('writes commands as lines', async function () {
        await proc.submit('1-gdb-set "width" 80');
        await new Promise<void>((resolve) => setImmediate(resolve));
        expect(fake.commandTexts()).to.deep.equal(['gdb-set "width" 80']);
    });

    it('refuses commands after GDB exited', async function () {
        fake.exit(2);
        const exit = await proc.exited;
        expect(exit.exitCode).to.eq(2);
        expect(proc.isActive()).to.eq(false);

        const err = await expectRejection(proc.submit('1-gdb-set "a" 1'));
        expect(err).to.be.an.instanceOf(ProcessTerminated);
        expect(err.message).to.eq('GDB process has already exited');
    });

    it('survives a broken command pipe', async function () {
        const errorSpy = sinon.spy(logger, 'error');
        fake.stdin.destroy(new Error('write EPIPE'));
        await new Promise<void>((resolve) => setImmediate(resolve));
        sinon.assert.calledWithExactly(
            errorSpy,
            '[test] GDB command pipe error: write EPIPE'
        );

        const err = await expectRejection(proc.submit('1-gdb-set "a" 1'));
        expect(err).to.be.an.instanceOf(ProcessTerminated);
        expect(err.message).to.match(/^GDB command pipe closed: /);
    });

    it('terminates GDB once, however often it is stopped', async function () {
        await Promise.all([proc.stop(), proc.stop()]);
        await proc.stop();
        expect(fake.kills).to.deep.equal(['SIGTERM']);
        expect((await proc.exited).signal).to.eq('SIGTERM');
    });

    it('kills GDB when it ignores SIGTERM', async function () {
        fake.ignoreSigterm = true;
        await proc.stop(20);
        expect(fake.kills).to.deep.equal(['SIGTERM', 'SIGKILL']);
    });

    it('sends no signal to a GDB that already exited', async function () {
        fake.exit(0);
        await proc.exited;
        await proc.stop();
        expect(fake.kills).to.deep.equal([]);
    });
});
