/*********************************************************************
 * Copyright (c) 2024 Renesas Electronics Corporation and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { IGDBProcessManager, IStdioProcess } from '../../types/gdb';
import { GDBProcess } from '../../processManagers/GDBProcess';

/**
 * Lines to answer a command with. A line starting with `^` is the
 * result record and gets the command's token.
 */
export type FakeReply = string[];

export type FakeHandler = (args: string[], fake: FakeGdb) => FakeReply;

export interface FakeCommand {
    token: number;
    command: string;
    args: string[];
    /** The line as written, without the token. */
    text: string;
}

export interface FakeBreakpoint {
    number: number;
    file?: string;
    line?: number;
    func?: string;
    cond?: string;
}

/** Split an MI argument list, undoing the C quoting. */
export function splitArgs(text: string): string[] {
    const args: string[] = [];
    const argRegex = /"((?:[^"\\]|\\.)*)"|(\S+)/g;
    let match = argRegex.exec(text);
    while (match) {
        args.push(
            match[1] !== undefined
                ? match[1].replace(/\\(.)/g, (_all, c: string) =>
                      c === 'n' ? '\n' : c === 't' ? '\t' : c === 'r' ? '\r' : c
                  )
                : match[2]
        );
        match = argRegex.exec(text);
    }
    return args;
}

function optionValue(args: string[], option: string): string | undefined {
    const index = args.indexOf(option);
    return index >= 0 ? args[index + 1] : undefined;
}

const running: FakeReply = ['^running', '*running,thread-id="all"'];

export function stoppedRecord(reason: string, extra = ''): string {
    return `*stopped,reason="${reason}",thread-id="1",stopped-threads="all"${extra}`;
}

/**
 * In-process stand-in for a GDB started with the MI interpreter. Every
 * answer is written on a later tick, the way a real process answers.
 */
export class FakeGdb extends EventEmitter implements IStdioProcess {
    public readonly stdin = new PassThrough();
    public readonly stdout = new PassThrough();
    public readonly stderr = new PassThrough();
    public exitCode: number | null = null;
    public signalCode: NodeJS.Signals | null = null;

    public readonly commands: FakeCommand[] = [];
    public readonly kills: NodeJS.Signals[] = [];
    public inFlight = 0;
    public maxInFlight = 0;
    /** Ignore SIGTERM, as a hung GDB would. */
    public ignoreSigterm = false;

    public breakpoints: FakeBreakpoint[] = [];
    public nextBreakpoint = 1;
    /** Lines that break-insert refuses. */
    public badLines = new Set<number>();
    public expressions = new Map<string, string>();

    protected readonly handlers = new Map<string, FakeHandler>();
    protected buffer = '';

    constructor() {
        super();
        this.stdin.setEncoding('utf8');
        this.stdin.on('data', (chunk: string) => this.handleInput(chunk));
        this.installDefaults();
        this.stdout.write('=thread-group-added,id="i1"\n(gdb)\n');
    }

    public getPID(): number | undefined {
        return 4242;
    }

    public kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
        this.kills.push(signal);
        if (signal === 'SIGTERM' && this.ignoreSigterm) {
            return true;
        }
        this.exit(null, signal);
        return true;
    }

    /** Replace the answer to one command. */
    public script(command: string, handler: FakeHandler) {
        this.handlers.set(command, handler);
    }

    /** Write records GDB sends on its own, such as `*stopped`. */
    public emitRecords(...lines: string[]) {
        setImmediate(() => {
            if (!this.stdout.writableEnded) {
                this.stdout.write(lines.map((line) => `${line}\n`).join(''));
            }
        });
    }

    public stop(reason = 'breakpoint-hit', extra = '') {
        this.emitRecords(stoppedRecord(reason, extra), '(gdb)');
    }

    public exit(code: number | null, signal: NodeJS.Signals | null = null) {
        if (this.exitCode !== null || this.signalCode !== null) {
            return;
        }
        this.exitCode = code;
        this.signalCode = signal;
        this.stdout.end();
        // After the last of stdout has been read
        setImmediate(() => this.emit('exit', code, signal));
    }

    public commandTexts(): string[] {
        return this.commands.map((command) => command.text);
    }

    protected handleInput(chunk: string) {
        this.buffer += chunk;
        let newline = this.buffer.indexOf('\n');
        while (newline >= 0) {
            const line = this.buffer.substring(0, newline);
            this.buffer = this.buffer.substring(newline + 1);
            this.handleCommand(line);
            newline = this.buffer.indexOf('\n');
        }
    }

    protected handleCommand(line: string) {
        const match = /^(\d+)-(\S+)\s*(.*)$/.exec(line);
        if (!match) {
            return;
        }
        const token = parseInt(match[1], 10);
        const command = match[2];
        const args = splitArgs(match[3]);
        this.commands.push({
            token,
            command,
            args,
            text: match[3] ? `${command} ${match[3]}` : command,
        });
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

        const handler = this.handlers.get(command);
        const reply = handler
            ? handler(args, this)
            : [
                  `^error,msg="Undefined MI command: ${command}",code="undefined-command"`,
              ];
        setImmediate(() => {
            this.inFlight--;
            if (this.stdout.writableEnded) {
                return;
            }
            const lines = reply.map((text) =>
                text.startsWith('^') ? `${token}${text}` : text
            );
            this.stdout.write(
                [...lines, '(gdb)'].map((l) => `${l}\n`).join('')
            );
        });
    }

    protected breakpointTuple(bp: FakeBreakpoint): string {
        const location =
            bp.func !== undefined
                ? `func="${bp.func}",file="main.c",fullname="/src/main.c",line="3"`
                : `func="main",file="${bp.file}",fullname="${bp.file}",line="${bp.line}"`;
        const cond = bp.cond !== undefined ? `,cond="${bp.cond}"` : '';
        return `{number="${bp.number}",type="breakpoint",disp="keep",enabled="y",addr="0x0000000000401136",${location}${cond},thread-groups=["i1"],times="0"}`;
    }

    protected installDefaults() {
        const done = (): FakeReply => ['^done'];
        for (const command of [
            'gdb-set',
            'enable-pretty-printing',
            'exec-arguments',
            'var-delete',
        ]) {
            this.script(command, done);
        }
        for (const command of [
            'exec-continue',
            'exec-next',
            'exec-next-instruction',
            'exec-step',
            'exec-step-instruction',
            'exec-finish',
        ]) {
            this.script(command, () => running);
        }
        this.script('exec-run', () => [
            '=thread-group-started,id="i1",pid="4243"',
            '=thread-created,id="1",group-id="i1"',
            ...running,
        ]);
        this.script('target-attach', (args) => [
            `=thread-group-started,id="i1",pid="${args[0]}"`,
            '=thread-created,id="1",group-id="i1"',
            '^done',
            '*stopped,frame={addr="0x00007ffff7e9a1b4",func="clock_nanosleep",args=[],from="/lib/libc.so.6"},thread-id="1",stopped-threads="all"',
        ]);
        this.script('exec-interrupt', () => [
            '^done',
            stoppedRecord(
                'signal-received',
                ',signal-name="SIGINT",signal-meaning="Interrupt"'
            ),
        ]);
        this.script('break-insert', (args, fake) => {
            const file = optionValue(args, '--source');
            const lineText = optionValue(args, '--line');
            const func = optionValue(args, '--function');
            const line = lineText !== undefined ? parseInt(lineText, 10) : undefined;
            if (line !== undefined && fake.badLines.has(line)) {
                return [`^error,msg="No line ${line} in file \\"${file}\\"."`];
            }
            const bp: FakeBreakpoint = {
                number: fake.nextBreakpoint++,
                file,
                line,
                func,
                cond: optionValue(args, '-c'),
            };
            fake.breakpoints.push(bp);
            return [`^done,bkpt=${fake.breakpointTuple(bp)}`];
        });
        this.script('break-delete', (args, fake) => {
            const ids = args.map((arg) => parseInt(arg, 10));
            fake.breakpoints = fake.breakpoints.filter(
                (bp) => !ids.includes(bp.number)
            );
            return ['^done'];
        });
        this.script('thread-info', () => [
            '^done,threads=[{id="1",target-id="Thread 0x7ffff7d8a740 (LWP 4243)",name="demo",frame={level="0",addr="0x0000000000401136",func="main",args=[],file="main.c",fullname="/src/main.c",line="5",arch="i386:x86-64"},state="stopped",core="0"}],current-thread-id="1"',
        ]);
        this.script('stack-list-frames', () => [
            '^done,stack=[frame={level="0",addr="0x0000000000401136",func="add",file="main.c",fullname="/src/main.c",line="5",arch="i386:x86-64"},frame={level="1",addr="0x0000000000401150",func="main",file="main.c",fullname="/src/main.c",line="12",arch="i386:x86-64"},frame={level="2",addr="0x00007ffff7dd1d90",func="__libc_start_call_main",from="/lib/x86_64-linux-gnu/libc.so.6",arch="i386:x86-64"}]',
        ]);
        this.script('stack-list-variables', () => [
            '^done,variables=[{name="count",type="int",value="42"},{name="origin",type="struct point"}]',
        ]);
        this.script('var-create', () => [
            '^done,name="var1",numchild="2",value="{...}",type="struct point",thread-id="1",has_more="0"',
        ]);
        this.script('var-list-children', () => [
            '^done,numchild="2",children=[child={name="var1.x",exp="x",numchild="0",value="1",type="int",thread-id="1"},child={name="var1.y",exp="y",numchild="0",value="2",type="int",thread-id="1"}],has_more="0"',
        ]);
        this.script('data-list-register-names', () => [
            '^done,register-names=["rax","rbx","","rip"]',
        ]);
        this.script('data-list-register-values', () => [
            '^done,register-values=[{number="0",value="0x2a"},{number="1",value="0x0"},{number="2",value="0x7"},{number="3",value="0x401136"}]',
        ]);
        this.script('data-evaluate-expression', (args, fake) => {
            const expression = args[args.length - 1];
            const value = fake.expressions.get(expression);
            return value !== undefined
                ? [`^done,value="${value}"`]
                : [
                      `^error,msg="No symbol \\"${expression}\\" in current context."`,
                  ];
        });
        this.script('interpreter-exec', (args) => [
            `~"ran ${args[args.length - 1]}\\n"`,
            '^done',
        ]);
        this.script('symbol-list-lines', () => [
            '^done,lines=[{pc="0x0000000000401126",line="3"},{pc="0x0000000000401136",line="5"},{pc="0x000000000040113a",line="5"},{pc="0x0000000000401141",line="6"},{pc="0x0000000000401150",line="12"}]',
        ]);
    }
}

/**
 * Hands out a GDBProcess over a FakeGdb instead of spawning anything.
 */
export class FakeProcessManager implements IGDBProcessManager {
    public starts: Array<{ gdbPath: string; programPath: string }> = [];

    constructor(public readonly fake: FakeGdb = new FakeGdb()) {}

    public async start(
        gdbPath: string,
        programPath: string
    ): Promise<GDBProcess> {
        this.starts.push({ gdbPath, programPath });
        const proc = new GDBProcess(this.fake, 'fake');
        await proc.ready;
        return proc;
    }
}
