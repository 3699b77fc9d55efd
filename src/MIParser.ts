/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { MI_PROMPT } from './constants/gdb';
import { MalformedRecord } from './gdb/errors';
import { MIRecord, MITuple, MIValue } from './mi/base';

const isDigit = (c: string | null) => c !== null && c >= '0' && c <= '9';
const isOctal = (c: string | null) => c !== null && c >= '0' && c <= '7';

export class MIParser {
    protected line = '';
    protected pos = 0;

    /**
     * Decode one line of GDB output. Lines that are not MI output records
     * come back as passthrough console output.
     *
     * @throws MalformedRecord when a record's nested structure is broken
     */
    public parseLine(line: string): MIRecord {
        this.line = line;
        this.pos = 0;

        let c = this.next();
        let token: number | undefined;
        if (isDigit(c)) {
            token = this.handleToken();
            c = this.next();
        }

        switch (c) {
            case '^': {
                const resultClass = this.handleString();
                const results = this.handleAsyncData();
                return token === undefined
                    ? { kind: 'result', resultClass, results }
                    : { kind: 'result', token, resultClass, results };
            }
            case '*':
            case '+':
            case '=': {
                const kind =
                    c === '*'
                        ? 'exec-async'
                        : c === '+'
                          ? 'status-async'
                          : 'notify-async';
                const asyncClass = this.handleString();
                const results = this.handleAsyncData();
                return token === undefined
                    ? { kind, asyncClass, results }
                    : { kind, token, asyncClass, results };
            }
            case '~':
                return { kind: 'console-stream', text: this.handleCString() };
            case '@':
                return { kind: 'target-stream', text: this.handleCString() };
            case '&':
                return { kind: 'log-stream', text: this.handleCString() };
            default:
                // Not MI, e.g. the banner or inferior output sharing the tty
                return {
                    kind: 'console-stream',
                    text: `${line}\n`,
                    passthrough: true,
                };
        }
    }

    protected next(): string | null {
        if (this.pos < this.line.length) {
            return this.line[this.pos++];
        } else {
            return null;
        }
    }

    protected peek(): string | null {
        return this.pos < this.line.length ? this.line[this.pos] : null;
    }

    protected back() {
        this.pos--;
    }

    protected malformed(reason: string): MalformedRecord {
        return new MalformedRecord(this.line, `${reason} at ${this.pos}`);
    }

    protected expect(expected: string) {
        const c = this.next();
        if (c !== expected) {
            throw this.malformed(`expected '${expected}'`);
        }
    }

    protected handleToken(): number {
        const start = this.pos - 1;
        while (isDigit(this.peek())) {
            this.pos++;
        }
        return parseInt(this.line.substring(start, this.pos), 10);
    }

    protected handleCString(): string {
        this.expect('"');

        let cstring = '';
        // Octal escapes are raw bytes, usually parts of one UTF-8 character
        let bytes: number[] = [];
        const flush = () => {
            if (bytes.length) {
                cstring += Buffer.from(bytes).toString('utf8');
                bytes = [];
            }
        };

        for (let c = this.next(); c !== null; c = this.next()) {
            if (c === '"') {
                flush();
                return cstring;
            }
            if (c !== '\\') {
                flush();
                cstring += c;
                continue;
            }
            const escaped = this.next();
            if (escaped === null) {
                break;
            }
            if (isOctal(escaped)) {
                let octal = escaped;
                while (octal.length < 3 && isOctal(this.peek())) {
                    octal += this.line[this.pos++];
                }
                bytes.push(parseInt(octal, 8));
                continue;
            }
            flush();
            switch (escaped) {
                case 'n':
                    cstring += '\n';
                    break;
                case 't':
                    cstring += '\t';
                    break;
                case 'r':
                    cstring += '\r';
                    break;
                default:
                    cstring += escaped;
            }
        }

        throw this.malformed('unterminated string');
    }

    protected handleString(): string {
        let str = '';
        for (let c = this.next(); c !== null; c = this.next()) {
            if (c === '=' || c === ',') {
                this.back();
                return str;
            } else {
                str += c;
            }
        }
        return str;
    }

    protected handleResult(result: MITuple) {
        const name = this.handleString();
        if (this.next() !== '=') {
            throw this.malformed(`expected '=' after '${name}'`);
        }
        const value = this.handleValue();
        const existing = result[name];
        // Repeated names (e.g. several bkpt entries) are collected in a list
        if (existing === undefined) {
            result[name] = value;
        } else if (Array.isArray(existing)) {
            existing.push(value);
        } else {
            result[name] = [existing, value];
        }
    }

    protected handleObject(): MITuple {
        this.expect('{');
        const result: MITuple = {};
        let c = this.next();
        while (c !== '}') {
            if (c === null) {
                throw this.malformed('unterminated tuple');
            }
            if (c !== ',') {
                this.back();
            }
            this.handleResult(result);
            c = this.next();
        }
        return result;
    }

    protected handleArray(): MIValue[] {
        this.expect('[');
        const result: MIValue[] = [];
        let c = this.next();
        while (c !== ']') {
            if (c === null) {
                throw this.malformed('unterminated list');
            }
            if (c !== ',') {
                this.back();
            }
            result.push(this.handleValue());
            c = this.next();
        }
        return result;
    }

    protected handleValue(): MIValue {
        switch (this.peek()) {
            case '"':
                return this.handleCString();
            case '{':
                return this.handleObject();
            case '[':
                return this.handleArray();
            case null:
                throw this.malformed('missing value');
            default: {
                // Named list element, only the value is kept
                const name = this.handleString();
                if (this.next() === '=') {
                    return this.handleValue();
                }
                throw this.malformed(`unexpected value '${name}'`);
            }
        }
    }

    protected handleAsyncData(): MITuple {
        const result: MITuple = {};

        let c = this.next();
        while (c === ',') {
            this.handleResult(result);
            c = this.next();
        }
        if (c !== null) {
            throw this.malformed(`unexpected '${c}'`);
        }

        return result;
    }
}

export function decodeLine(text: string): MIRecord {
    return new MIParser().parseLine(text);
}

export function isPrompt(text: string): boolean {
    return text.trim() === MI_PROMPT;
}
