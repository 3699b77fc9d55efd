/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

import { expect } from 'chai';
import { processArgv, USAGE } from '../debugAdapter';

describe('command line', function () {
    it('takes the GDB and program paths', function () {
        expect(processArgv(['gdb', './demo'])).to.deep.equal({
            gdbPath: 'gdb',
            programPath: './demo',
            port: undefined,
            logFile: undefined,
            verbose: false,
        });
    });

    it('takes options before the paths', function () {
        expect(
            processArgv([
                '--server=4711',
                '--verbose',
                '--log-file=/tmp/bridge.log',
                '/usr/bin/gdb-multiarch',
                'demo',
            ])
        ).to.deep.equal({
            gdbPath: '/usr/bin/gdb-multiarch',
            programPath: 'demo',
            port: 4711,
            logFile: '/tmp/bridge.log',
            verbose: true,
        });
    });

    it('refuses unknown options', function () {
        expect(() => processArgv(['--bogus', 'gdb', 'demo'])).to.throw(
            `Unknown option --bogus\n${USAGE}`
        );
    });

    it('needs exactly two paths', function () {
        expect(() => processArgv(['gdb'])).to.throw(USAGE);
        expect(() => processArgv(['gdb', 'demo', 'extra'])).to.throw(USAGE);
        expect(() => processArgv([])).to.throw(USAGE);
    });

    it('takes a port only as a number', function () {
        expect(() => processArgv(['--server=abc', 'gdb', 'demo'])).to.throw(
            'Unknown option --server=abc'
        );
    });
});
