/*********************************************************************
 * Copyright (c) 2025 QNX Software Systems, Arm Limited and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { IGDBBackend } from '../types/gdb';
import { getNumber, getString, getTuples } from './base';

export interface MISourceLine {
    pc: string;
    line: number;
}

/**
 * Lines of a source file that have code, as known to the debug info.
 */
export async function sendSymbolListLines(
    gdb: IGDBBackend,
    filename: string
): Promise<MISourceLine[]> {
    const results = await gdb.sendCommand('symbol-list-lines', [filename]);
    return getTuples(results, 'lines').map((entry) => ({
        pc: getString(entry, 'pc') ?? '',
        line: getNumber(entry, 'line') ?? 0,
    }));
}
