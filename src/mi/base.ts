/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { standardEscape } from '../util/standardEscape';

export type MIValue = string | MITuple | MIValue[];

export interface MITuple {
    [key: string]: MIValue;
}

export interface MIResultRecord {
    kind: 'result';
    token?: number;
    resultClass: string;
    results: MITuple;
}

export interface MIAsyncRecord {
    kind: 'exec-async' | 'status-async' | 'notify-async';
    token?: number;
    asyncClass: string;
    results: MITuple;
}

export interface MIStreamRecord {
    kind: 'console-stream' | 'target-stream' | 'log-stream';
    text: string;
    /** Set for output lines that are not MI at all (banners, prompts). */
    passthrough?: boolean;
}

export type MIRecord = MIResultRecord | MIAsyncRecord | MIStreamRecord;

/**
 * A `--name value` (or `-n value` for single letter names) option.
 */
export interface MIOption {
    option: string;
    value?: string | number;
}

/**
 * Text written as is, such as a command line typed by a user.
 */
export interface MIVerbatim {
    verbatim: string;
}

export type MIArgument = string | number | MIOption | MIVerbatim;

export function opt(option: string, value?: string | number): MIOption {
    return { option, value };
}

export function encodeArgument(arg: MIArgument): string {
    if (typeof arg === 'number') {
        return String(arg);
    }
    if (typeof arg === 'string') {
        return standardEscape(arg);
    }
    if ('verbatim' in arg) {
        return arg.verbatim;
    }
    const flag = arg.option.length === 1 ? `-${arg.option}` : `--${arg.option}`;
    return arg.value === undefined
        ? flag
        : `${flag} ${encodeArgument(arg.value)}`;
}

/**
 * Serialize one MI command as `<token>-<command> <arg> ...`.
 */
export function encodeCommand(
    token: number,
    command: string,
    args: MIArgument[] = []
): string {
    const name = command.startsWith('-') ? command.substring(1) : command;
    return [`${token}-${name}`, ...args.map(encodeArgument)].join(' ');
}

export function isTuple(value: MIValue | undefined): value is MITuple {
    return typeof value === 'object' && !Array.isArray(value);
}

export function getString(tuple: MITuple, key: string): string | undefined {
    const value = tuple[key];
    return typeof value === 'string' ? value : undefined;
}

export function getNumber(tuple: MITuple, key: string): number | undefined {
    const value = getString(tuple, key);
    if (value === undefined) {
        return undefined;
    }
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? undefined : parsed;
}

export function getTuple(tuple: MITuple, key: string): MITuple | undefined {
    const value = tuple[key];
    return isTuple(value) ? value : undefined;
}

/**
 * Returns a list value. A lone tuple where a list is expected is
 * returned as a list of one.
 */
export function getList(tuple: MITuple, key: string): MIValue[] {
    const value = tuple[key];
    if (Array.isArray(value)) {
        return value;
    }
    return value === undefined ? [] : [value];
}

export function getTuples(tuple: MITuple, key: string): MITuple[] {
    return getList(tuple, key).filter(isTuple);
}

export function getStrings(tuple: MITuple, key: string): string[] {
    return getList(tuple, key).filter(
        (value): value is string => typeof value === 'string'
    );
}

// Shared types
export interface MIBreakpointInfo {
    number: string;
    type: string;
    disp?: string;
    enabled: boolean;
    addr?: string;
    func?: string;
    file?: string;
    fullname?: string;
    line?: number;
    times: number;
    'original-location'?: string;
    cond?: string;
    pending?: string;
}

export interface MIFrameInfo {
    level: number;
    func?: string;
    addr?: string;
    file?: string;
    fullname?: string;
    line?: number;
    from?: string;
}

export interface MIVariableInfo {
    name: string;
    value?: string;
    type?: string;
}

export interface MIThreadInfo {
    id: string;
    targetId: string;
    name?: string;
    details?: string;
    state?: string;
    frame?: MIFrameInfo;
}

export function toBreakpointInfo(tuple: MITuple): MIBreakpointInfo {
    return {
        number: getString(tuple, 'number') ?? '',
        type: getString(tuple, 'type') ?? 'breakpoint',
        disp: getString(tuple, 'disp'),
        enabled: getString(tuple, 'enabled') !== 'n',
        addr: getString(tuple, 'addr'),
        func: getString(tuple, 'func'),
        file: getString(tuple, 'file'),
        fullname: getString(tuple, 'fullname'),
        line: getNumber(tuple, 'line'),
        times: getNumber(tuple, 'times') ?? 0,
        'original-location': getString(tuple, 'original-location'),
        cond: getString(tuple, 'cond'),
        pending: getString(tuple, 'pending'),
    };
}

export function toFrameInfo(tuple: MITuple): MIFrameInfo {
    return {
        level: getNumber(tuple, 'level') ?? 0,
        func: getString(tuple, 'func'),
        addr: getString(tuple, 'addr'),
        file: getString(tuple, 'file'),
        fullname: getString(tuple, 'fullname'),
        line: getNumber(tuple, 'line'),
        from: getString(tuple, 'from'),
    };
}

export function toVariableInfo(tuple: MITuple): MIVariableInfo {
    return {
        name: getString(tuple, 'name') ?? '',
        value: getString(tuple, 'value'),
        type: getString(tuple, 'type'),
    };
}
