/*********************************************************************
 * Copyright (c) 2018, 2023 Ericsson and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { PassThrough } from 'stream';
import { DebugClient } from '@vscode/debugadapter-testsupport';
import { DebugProtocol } from '@vscode/debugprotocol';
import { connectSession } from '../debugAdapter';
import { GDBDebugSession } from '../gdb/GDBDebugSession';
import { LaunchRequestArguments } from '../types/session';
import { FakeGdb, FakeProcessManager } from './mocks/fakeGdb';

/**
 * Extend the standard DebugClient to talk to a session in this process,
 * through the same framing the adapter uses on stdio, with GDB played
 * by a FakeGdb.
 */
export class BridgeDebugClient extends DebugClient {
    public readonly fake: FakeGdb;
    public readonly processManager: FakeProcessManager;
    public readonly session: GDBDebugSession;
    protected readonly toAdapter = new PassThrough();
    protected readonly fromAdapter = new PassThrough();

    constructor(
        fake: FakeGdb = new FakeGdb(),
        processManager: FakeProcessManager = new FakeProcessManager(fake)
    ) {
        // The unused are as such because we do not launch an adapter
        super('unused', 'unused', 'gdb');
        this.fake = fake;
        this.processManager = processManager;
        this.session = new GDBDebugSession({
            gdbPath: 'gdb',
            programPath: '/src/demo',
            name: 'test',
            processManager: this.processManager,
        });
        // Smaller than the mocha timeout so waitForEvent failures show
        this.defaultTimeout = 2500;
    }

    public start(): Promise<void> {
        connectSession(this.session, this.toAdapter, this.fromAdapter);
        this.connect(this.fromAdapter, this.toAdapter);
        return Promise.resolve();
    }

    public async stop(): Promise<void> {
        await super.stop();
        this.toAdapter.end();
    }

    public async initialize(): Promise<void> {
        const initialized = this.waitForEvent('initialized');
        await this.initializeRequest();
        await initialized;
    }

    /**
     * Initialize, launch and finish configuration, leaving the program
     * running.
     */
    public async launchProgram(
        args: LaunchRequestArguments = {}
    ): Promise<void> {
        await this.initialize();
        await this.launchRequest(args);
        await this.configurationDoneRequest();
    }

    /**
     * Stop the program through GDB and wait for the stopped event.
     */
    public async stopAt(
        reason = 'breakpoint-hit',
        extra = ''
    ): Promise<DebugProtocol.Event> {
        const stopped = this.waitForEvent('stopped');
        this.fake.stop(reason, extra);
        return stopped;
    }

    /** MI commands GDB received, as `command args`, matching a prefix. */
    public commands(prefix = ''): string[] {
        return this.fake
            .commandTexts()
            .filter((text) => text.startsWith(prefix));
    }
}
