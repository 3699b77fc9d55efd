#!/usr/bin/env node
/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import * as net from 'net';
import { Readable, Writable } from 'stream';
import { logger } from '@vscode/debugadapter/lib/logger';
import { GDBDebugSession } from './gdb/GDBDebugSession';
import { errorMessage } from './gdb/errors';
import { DAPTransport } from './transport/DAPTransport';

export const USAGE =
    'Usage: mi-dap-bridge [--server=<port>] [--log-file=<path>] [--verbose] <gdb> <program>';

export interface AdapterArguments {
    gdbPath: string;
    programPath: string;
    /** Serve DAP over TCP on this port instead of stdio. */
    port?: number;
    logFile?: string;
    verbose: boolean;
}

/**
 * Parse the command line, without the node and script entries.
 *
 * @throws Error carrying the usage text when the arguments do not fit
 */
export function processArgv(args: string[]): AdapterArguments {
    const positional: string[] = [];
    const result: Partial<AdapterArguments> = { verbose: false };
    for (const arg of args) {
        const serverMatch = /^--server=(\d+)$/.exec(arg);
        const logFileMatch = /^--log-file=(.+)$/.exec(arg);
        if (serverMatch) {
            result.port = parseInt(serverMatch[1], 10);
        } else if (logFileMatch) {
            result.logFile = logFileMatch[1];
        } else if (arg === '--verbose') {
            result.verbose = true;
        } else if (arg.startsWith('--')) {
            throw new Error(`Unknown option ${arg}\n${USAGE}`);
        } else {
            positional.push(arg);
        }
    }
    if (positional.length !== 2) {
        throw new Error(USAGE);
    }
    const [gdbPath, programPath] = positional;
    return {
        gdbPath,
        programPath,
        port: result.port,
        logFile: result.logFile,
        verbose: result.verbose ?? false,
    };
}

/**
 * A session of its own for every client. Sessions sharing a server log
 * to their own client and file.
 */
export function createSession(
    args: AdapterArguments,
    name: string,
    runAsServer = false
): GDBDebugSession {
    return new GDBDebugSession({
        gdbPath: args.gdbPath,
        programPath: args.programPath,
        name,
        verbose: args.verbose,
        logFile:
            args.logFile && runAsServer
                ? `${args.logFile}.${name}`
                : args.logFile,
        runAsServer,
    });
}

/**
 * Serve one session on a DAP byte stream pair. The session ends with
 * the client's disconnect or with the input stream.
 */
export function connectSession(
    session: GDBDebugSession,
    input: Readable,
    output: Writable,
    name?: string
): DAPTransport {
    const transport = new DAPTransport(session, input, output, name);
    transport.start();
    return transport;
}

function serve(args: AdapterArguments, port: number) {
    let sessions = 0;
    const server = net.createServer((socket) => {
        const name = `session-${++sessions}`;
        const session = createSession(args, name, true);
        connectSession(session, socket, socket, name);
        session.closed
            .then(() => socket.end())
            .catch((err) =>
                logger.error(`Session ended badly: ${errorMessage(err)}`)
            );
    });
    server.on('error', (err) => {
        process.stderr.write(`${err.message}\n`);
        process.exit(1);
    });
    server.listen(port, '127.0.0.1');
}

async function main() {
    let args: AdapterArguments;
    try {
        args = processArgv(process.argv.slice(2));
    } catch (err) {
        process.stderr.write(`${errorMessage(err)}\n`);
        process.exit(2);
    }
    if (args.port !== undefined) {
        serve(args, args.port);
        return;
    }
    const session = createSession(args, 'session-1');
    connectSession(session, process.stdin, process.stdout, 'session-1');
    const code = await session.closed;
    process.stdout.write('', () => process.exit(code));
}

if (require.main === module) {
    main().catch((err) => {
        process.stderr.write(`${errorMessage(err)}\n`);
        process.exit(1);
    });
}
