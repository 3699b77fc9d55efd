/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
import { readFile } from 'fs/promises';
import * as path from 'path';
import {
    Handles,
    InitializedEvent,
    LoggingDebugSession,
    OutputEvent,
    Response,
    Scope,
    Source,
    StackFrame,
    TerminatedEvent,
} from '@vscode/debugadapter';
import {
    ILogger,
    Logger,
    logger,
    LogLevel,
} from '@vscode/debugadapter/lib/logger';
import { DebugProtocol } from '@vscode/debugprotocol';
import { EXIT_REASONS, STARTUP_COMMANDS } from '../constants/gdb';
import {
    EXECUTION_REQUESTS,
    INSPECTION_REQUESTS,
    SUPPORTED_REQUESTS,
} from '../constants/session';
import { translateAsyncRecord } from '../events/eventTranslator';
import * as mi from '../mi';
import { NamedLogger } from '../namedLogger';
import { GDBFileSystemProcessManager } from '../processManagers/GDBFileSystemProcessManager';
import { IGDBBackend, IGDBProcessManager } from '../types/gdb';
import {
    AttachRequestArguments,
    FrameReference,
    LaunchRequestArguments,
    SessionState,
    VariableReference,
} from '../types/session';
import { VarManager } from '../varManager';
import {
    BreakpointRecord,
    BreakpointTable,
    functionBreakpointKey,
    parseHitCondition,
    resolveBreakpoints,
    sourceBreakpointKey,
    toDapBreakpoint,
} from './breakpoints';
import { GDBThread } from './common';
import {
    BridgeError,
    errorCode,
    errorMessage,
    GDBError,
    ProcessExited,
    SessionBusy,
    SessionNotStarted,
    SessionTerminated,
    UnknownRequest,
} from './errors';
import { GDBBackend } from './GDBBackend';

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export interface GDBDebugSessionOptions {
    gdbPath: string;
    programPath: string;
    /** Prefix of every log line of this session. */
    name?: string;
    verbose?: boolean;
    logFile?: string;
    /** Defaults to starting GDB as a local child process. */
    processManager?: IGDBProcessManager;
    /**
     * One of several sessions in the adapter: it logs through a logger
     * of its own instead of the adapter wide one.
     */
    runAsServer?: boolean;
}

interface ActiveRequest {
    seq: number;
    done: () => void;
}

/**
 * One DAP client connection driving one GDB.
 *
 * Requests are queued and handled one at a time, each finished by its
 * response. MI async records are applied as they arrive, so the state
 * a request sees is the state of the MI stream so far.
 */
export class GDBDebugSession extends LoggingDebugSession {
    protected readonly gdb: IGDBBackend;
    protected readonly sessionLogger: Logger;
    protected readonly logger: NamedLogger;
    protected readonly varManager: VarManager;
    protected readonly breakpoints = new BreakpointTable();

    protected state: SessionState = 'unstarted';
    protected stopReason?: string;
    protected programStarted = false;
    /** Set until the stop that follows attaching. */
    protected attaching = false;
    protected launchArgs?: LaunchRequestArguments;
    protected launchFailed = false;
    protected disconnecting = false;
    protected connectionClosed = false;
    protected terminatedSent = false;

    protected threads?: GDBThread[];
    protected readonly stackFrames = new Map<
        number,
        DebugProtocol.StackFrame[]
    >();
    protected frameHandles = new Handles<FrameReference>();
    protected variableHandles = new Handles<VariableReference>();
    protected registerNames?: string[];

    protected requestQueue: DebugProtocol.Request[] = [];
    protected activeRequest?: ActiveRequest;
    protected draining = false;
    protected idleCallbacks: Array<() => void> = [];

    /** Resolves with the exit status of the adapter once the session ends. */
    public readonly closed: Promise<number>;
    protected resolveClosed: (code: number) => void = () => undefined;

    constructor(protected readonly options: GDBDebugSessionOptions) {
        super();
        this.setRunAsServer(options.runAsServer ?? false);
        this.sessionLogger = options.runAsServer ? new Logger() : logger;
        this.logger = new NamedLogger(options.name, this.sessionLogger);
        this.closed = new Promise<number>((resolve) => {
            this.resolveClosed = resolve;
        });
        this.gdb = this.createBackend(
            options.processManager ??
                new GDBFileSystemProcessManager(
                    options.name,
                    this.sessionLogger
                )
        );
        this.varManager = new VarManager(this.gdb, this.logger.child('vars'));
        // Log lines go to the client as output events, stdout may be
        // carrying the protocol itself
        this.sessionLogger.init(
            (event) => this.sendEvent(event),
            undefined,
            false
        );
        this.setupLogger(options.verbose, options.logFile);
        this.attachGDBListeners();
    }

    protected createBackend(processManager: IGDBProcessManager): IGDBBackend {
        return new GDBBackend(
            processManager,
            this.options.name,
            this.sessionLogger
        );
    }

    /** The logger this session's messages go through. */
    public get logSink(): ILogger {
        return this.sessionLogger;
    }

    protected setupLogger(verbose?: boolean, logFile?: string) {
        this.sessionLogger.setup(
            verbose ? LogLevel.Verbose : LogLevel.Warn,
            logFile ?? false
        );
    }

    public start(
        inStream: NodeJS.ReadableStream,
        outStream: NodeJS.WritableStream
    ): void {
        super.start(inStream, outStream);
        // start points the adapter wide logger at this session
        if (this.sessionLogger !== logger) {
            logger.setup(LogLevel.Stop, false);
        }
        this.setupLogger(this.options.verbose, this.options.logFile);
    }

    /**
     * The session ends with its connection, see close. The adapter
     * process goes on serving other sessions or exits by itself.
     */
    public shutdown(): void {
        // Nothing to do before close
    }

    protected attachGDBListeners() {
        this.gdb.on('consoleStreamOutput', (output, category) => {
            this.sendEvent(new OutputEvent(output, category));
        });
        this.gdb.on('resultAsync', (record) => {
            if (record.resultClass === 'running') {
                this.setRunning();
            }
        });
        this.gdb.on('execAsync', (record) => this.handleGDBAsync(record));
        this.gdb.on('notifyAsync', (record) => this.handleGDBAsync(record));
        this.gdb.on('statusAsync', (record) => this.handleGDBAsync(record));
        this.gdb.on('exit', (code, signal) => this.handleGDBExit(code, signal));
    }

    public get sessionState(): SessionState {
        return this.state;
    }

    public get lastStopReason(): string | undefined {
        return this.stopReason;
    }

    public sendEvent(event: DebugProtocol.Event): void {
        if (this.connectionClosed) {
            return;
        }
        if (event.event === 'terminated') {
            if (this.terminatedSent) {
                return;
            }
            this.terminatedSent = true;
        }
        super.sendEvent(event);
    }

    public sendResponse(response: DebugProtocol.Response): void {
        if (!this.connectionClosed) {
            super.sendResponse(response);
        }
        const active = this.activeRequest;
        if (active && active.seq === response.request_seq) {
            this.activeRequest = undefined;
            active.done();
        }
    }

    protected sendBridgeErrorResponse(
        response: DebugProtocol.Response,
        err: unknown
    ) {
        this.sendErrorResponse(response, errorCode(err), errorMessage(err));
    }

    /**
     * Queue a request behind the ones still being handled. Disconnect
     * cuts the line.
     */
    protected dispatchRequest(request: DebugProtocol.Request): void {
        if (request.command === 'disconnect') {
            super.dispatchRequest(request);
            return;
        }
        if (!SUPPORTED_REQUESTS.has(request.command)) {
            this.sendBridgeErrorResponse(
                new Response(request),
                new UnknownRequest(request.command)
            );
            return;
        }
        this.requestQueue.push(request);
        if (!this.draining) {
            this.drainRequestQueue().catch((err) =>
                this.logger.error(
                    `Request queue stopped: ${errorMessage(err)}`
                )
            );
        }
    }

    protected async drainRequestQueue(): Promise<void> {
        this.draining = true;
        try {
            for (
                let request = this.requestQueue.shift();
                request;
                request = this.requestQueue.shift()
            ) {
                if (this.state !== 'terminated') {
                    await this.varManager.deleteStaleVars();
                }
                await this.runRequest(request);
            }
        } finally {
            this.draining = false;
            for (const callback of this.idleCallbacks.splice(0)) {
                callback();
            }
        }
    }

    /** Run once every queued request has been answered. */
    protected whenIdle(callback: () => void) {
        if (this.draining) {
            this.idleCallbacks.push(callback);
        } else {
            callback();
        }
    }

    /**
     * Resolves once the request has been answered.
     */
    protected runRequest(request: DebugProtocol.Request): Promise<void> {
        return new Promise<void>((resolve) => {
            this.activeRequest = { seq: request.seq, done: resolve };
            const rejection = this.checkRequest(request.command);
            if (rejection) {
                this.sendBridgeErrorResponse(new Response(request), rejection);
                return;
            }
            super.dispatchRequest(request);
        });
    }

    protected checkRequest(command: string): BridgeError | undefined {
        if (this.state === 'terminated') {
            return new SessionTerminated(command);
        }
        if (this.state === 'unstarted' && command !== 'initialize') {
            return new SessionNotStarted(command);
        }
        if (this.state !== 'unstarted' && command === 'initialize') {
            return new BridgeError('The session is already initialized');
        }
        if (
            this.state === 'running' &&
            (INSPECTION_REQUESTS.has(command) ||
                EXECUTION_REQUESTS.has(command))
        ) {
            return new SessionBusy(command);
        }
        return undefined;
    }

    protected clearCaches() {
        this.threads = undefined;
        this.stackFrames.clear();
        this.frameHandles.reset();
        this.variableHandles.reset();
        this.varManager.invalidate();
    }

    protected setRunning() {
        if (this.state === 'terminated') {
            return;
        }
        this.state = 'running';
        this.stopReason = undefined;
        this.clearCaches();
    }

    protected handleGDBAsync(received: mi.MIAsyncRecord) {
        const record = this.attachStop(received);
        this.updateState(record);
        const { events, handled } = translateAsyncRecord(record);
        if (!handled) {
            this.logger.warn(
                `GDB unhandled async: ${record.asyncClass}: ${JSON.stringify(
                    record.results
                )}`
            );
        }
        for (const event of events) {
            this.sendEvent(event);
        }
    }

    /** GDB gives no reason for stopping a process it attached to. */
    protected attachStop(record: mi.MIAsyncRecord): mi.MIAsyncRecord {
        if (!this.attaching || record.asyncClass !== 'stopped') {
            return record;
        }
        this.attaching = false;
        return mi.getString(record.results, 'reason') === undefined
            ? { ...record, results: { ...record.results, reason: 'entry' } }
            : record;
    }

    protected updateState(record: mi.MIAsyncRecord) {
        if (this.state === 'terminated') {
            return;
        }
        const results = record.results;
        switch (record.asyncClass) {
            case 'running':
                this.setRunning();
                break;
            case 'stopped': {
                const reason = mi.getString(results, 'reason') ?? 'unknown';
                this.clearCaches();
                this.state = 'stopped';
                this.stopReason = reason;
                if (EXIT_REASONS.has(reason)) {
                    this.programStarted = false;
                }
                break;
            }
            case 'breakpoint-modified': {
                const bkpt = mi.getTuple(results, 'bkpt');
                if (bkpt) {
                    this.breakpoints.update(mi.toBreakpointInfo(bkpt));
                }
                break;
            }
            case 'breakpoint-deleted': {
                const id = mi.getNumber(results, 'id');
                if (id !== undefined) {
                    this.breakpoints.remove(id);
                }
                break;
            }
            case 'thread-created':
            case 'thread-exited':
                this.threads = undefined;
                break;
            case 'thread-group-started':
                this.programStarted = true;
                break;
            case 'thread-group-exited':
                this.programStarted = false;
                break;
        }
    }

    protected handleGDBExit(
        code: number | null,
        signal: NodeJS.Signals | null
    ) {
        const exit = new ProcessExited(code, signal);
        this.logger.verbose(exit.message);
        // Queued requests are refused in turn, after the one in flight
        // has failed with the exit
        this.state = 'terminated';
        this.whenIdle(() => {
            if (!this.disconnecting) {
                this.sendEvent(
                    new OutputEvent(`${exit.message}\n`, 'console')
                );
            }
            this.sendEvent(new TerminatedEvent());
        });
    }

    /**
     * The client connection is gone: stop GDB without answering anything.
     */
    public async close(): Promise<void> {
        this.connectionClosed = true;
        this.disconnecting = true;
        this.gdb.abandonAll();
        this.requestQueue = [];
        const active = this.activeRequest;
        this.activeRequest = undefined;
        active?.done();
        this.state = 'terminated';
        try {
            await this.gdb.stop();
        } finally {
            if (this.sessionLogger !== logger) {
                await this.sessionLogger.dispose();
            }
            this.resolveClosed(this.launchFailed ? 1 : 0);
        }
    }

    protected async initializeRequest(
        response: DebugProtocol.InitializeResponse,
        _args: DebugProtocol.InitializeRequestArguments
    ): Promise<void> {
        this.state = 'launching';
        try {
            await this.gdb.spawn(
                this.options.gdbPath,
                this.options.programPath
            );
            for (const { command, args } of STARTUP_COMMANDS) {
                await this.gdb.sendCommand(command, args);
            }
        } catch (err) {
            this.logger.error(`Failed to start GDB: ${errorMessage(err)}`);
            this.launchFailed = true;
            this.state = 'terminated';
            this.sendBridgeErrorResponse(response, err);
            this.sendEvent(new TerminatedEvent());
            return;
        }
        this.state = 'stopped';
        this.stopReason = 'initial';

        response.body = response.body || {};
        response.body.supportsConfigurationDoneRequest = true;
        response.body.supportsFunctionBreakpoints = true;
        response.body.supportsConditionalBreakpoints = true;
        response.body.supportsHitConditionalBreakpoints = true;
        response.body.supportsBreakpointLocationsRequest = true;
        response.body.supportsSteppingGranularity = true;
        response.body.supportsEvaluateForHovers = true;
        this.sendResponse(response);
        this.sendEvent(new InitializedEvent());
    }

    protected async launchRequest(
        response: DebugProtocol.LaunchResponse,
        args: LaunchRequestArguments = {}
    ): Promise<void> {
        try {
            this.setupLogger(
                args.verbose ?? this.options.verbose,
                args.logFile ?? this.options.logFile
            );
            if (args.arguments) {
                await mi.sendExecArguments(this.gdb, {
                    arguments: args.arguments,
                });
            }
            for (const command of args.initCommands ?? []) {
                await this.gdb.sendUserCommand(command);
            }
            this.launchArgs = args;
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected parseProcessId(processId?: string | number): number {
        const pid = processId === undefined ? NaN : Number(processId);
        if (!Number.isInteger(pid) || pid <= 0) {
            throw new BridgeError(
                processId === undefined
                    ? 'Attach needs a processId'
                    : `Invalid processId '${processId}'`
            );
        }
        return pid;
    }

    /**
     * Attach GDB to a running process. GDB stops it and reports the
     * stop, which goes to the client as an entry stop.
     */
    protected async attachRequest(
        response: DebugProtocol.AttachResponse,
        args: AttachRequestArguments = {}
    ): Promise<void> {
        try {
            this.setupLogger(
                args.verbose ?? this.options.verbose,
                args.logFile ?? this.options.logFile
            );
            const pid = this.parseProcessId(args.processId);
            for (const command of args.initCommands ?? []) {
                await this.gdb.sendUserCommand(command);
            }
            this.attaching = true;
            await mi.sendTargetAttachRequest(this.gdb, { pid });
            this.programStarted = true;
            this.sendEvent(new OutputEvent(`attached to process ${pid}\n`));
            this.sendResponse(response);
        } catch (err) {
            this.attaching = false;
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async configurationDoneRequest(
        response: DebugProtocol.ConfigurationDoneResponse,
        _args: DebugProtocol.ConfigurationDoneArguments
    ): Promise<void> {
        try {
            if (this.launchArgs && !this.programStarted) {
                await mi.sendExecRun(this.gdb, {
                    start: this.launchArgs.stopOnEntry,
                });
                this.programStarted = true;
            }
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    /**
     * Insert one breakpoint. A location GDB refuses leaves the
     * breakpoint unverified, with GDB's reason as its message.
     */
    protected async insertBreakpoint(
        record: BreakpointRecord,
        location: mi.MIArgument[]
    ): Promise<BreakpointRecord> {
        let hit: { ignoreCount?: number; temporary?: boolean } = {};
        if (record.hitCondition) {
            const parsed = parseHitCondition(record.hitCondition);
            if (!parsed) {
                return {
                    ...record,
                    message: `Unable to decode expression: ${record.hitCondition}`,
                };
            }
            hit = parsed;
        }
        try {
            const { bkpt } = await mi.sendBreakpointInsert(
                this.gdb,
                location,
                {
                    condition: record.condition,
                    ignoreCount: hit.ignoreCount,
                    temporary: hit.temporary,
                }
            );
            const inserted: BreakpointRecord = {
                ...record,
                gdbId: parseInt(bkpt.number, 10),
                verified: true,
                hitCount: bkpt.times,
            };
            if (bkpt.line !== undefined && bkpt.line !== record.line) {
                inserted.actualLine = bkpt.line;
            }
            return inserted;
        } catch (err) {
            if (err instanceof GDBError) {
                return { ...record, message: err.message };
            }
            throw err;
        }
    }

    protected async deleteBreakpoints(records: BreakpointRecord[]) {
        const ids = records
            .map((record) => record.gdbId)
            .filter((id): id is number => id !== undefined);
        if (ids.length) {
            await mi.sendBreakDelete(this.gdb, { breakpoints: ids });
        }
    }

    protected async setBreakPointsRequest(
        response: DebugProtocol.SetBreakpointsResponse,
        args: DebugProtocol.SetBreakpointsArguments
    ): Promise<void> {
        try {
            const file = args.source.path;
            if (!file) {
                throw new BridgeError('Breakpoints need a source path');
            }
            const { resolved, deletes } = resolveBreakpoints(
                args.breakpoints ?? [],
                this.breakpoints.getSource(file),
                sourceBreakpointKey
            );

            // Delete before insert to avoid breakpoint clashes in gdb
            await this.deleteBreakpoints(deletes);

            const records: BreakpointRecord[] = [];
            for (const { bp, record } of resolved) {
                records.push(
                    record ??
                        (await this.insertBreakpoint(
                            {
                                key: sourceBreakpointKey(bp),
                                source: file,
                                line: bp.line,
                                condition: bp.condition,
                                hitCondition: bp.hitCondition,
                                verified: false,
                                hitCount: 0,
                            },
                            mi.sourceBreakpointLocation(file, bp.line)
                        ))
                );
            }
            this.breakpoints.replaceSource(file, records);

            response.body = { breakpoints: records.map(toDapBreakpoint) };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async setFunctionBreakPointsRequest(
        response: DebugProtocol.SetFunctionBreakpointsResponse,
        args: DebugProtocol.SetFunctionBreakpointsArguments
    ): Promise<void> {
        try {
            const { resolved, deletes } = resolveBreakpoints(
                args.breakpoints,
                this.breakpoints.getFunctions(),
                functionBreakpointKey
            );

            await this.deleteBreakpoints(deletes);

            const records: BreakpointRecord[] = [];
            for (const { bp, record } of resolved) {
                records.push(
                    record ??
                        (await this.insertBreakpoint(
                            {
                                key: functionBreakpointKey(bp),
                                functionName: bp.name,
                                condition: bp.condition,
                                hitCondition: bp.hitCondition,
                                verified: false,
                                hitCount: 0,
                            },
                            mi.functionBreakpointLocation(bp.name)
                        ))
                );
            }
            this.breakpoints.replaceFunctions(records);

            response.body = { breakpoints: records.map(toDapBreakpoint) };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async breakpointLocationsRequest(
        response: DebugProtocol.BreakpointLocationsResponse,
        args: DebugProtocol.BreakpointLocationsArguments
    ): Promise<void> {
        try {
            const file = args.source.path;
            if (!file) {
                throw new BridgeError(
                    'Breakpoint locations need a source path'
                );
            }
            const endLine = args.endLine ?? args.line;
            const lines = (await mi.sendSymbolListLines(this.gdb, file))
                .map((entry) => entry.line)
                .filter((line) => line >= args.line && line <= endLine);
            response.body = {
                breakpoints: [...new Set(lines)]
                    .sort((a, b) => a - b)
                    .map((line) => ({ line })),
            };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async continueRequest(
        response: DebugProtocol.ContinueResponse,
        _args: DebugProtocol.ContinueArguments
    ): Promise<void> {
        try {
            if (this.programStarted) {
                await mi.sendExecContinue(this.gdb);
            } else {
                await mi.sendExecRun(this.gdb);
                this.programStarted = true;
            }
            response.body = { allThreadsContinued: true };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async nextRequest(
        response: DebugProtocol.NextResponse,
        args: DebugProtocol.NextArguments
    ): Promise<void> {
        try {
            await (args.granularity === 'instruction'
                ? mi.sendExecNextInstruction(this.gdb, args.threadId)
                : mi.sendExecNext(this.gdb, args.threadId));
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async stepInRequest(
        response: DebugProtocol.StepInResponse,
        args: DebugProtocol.StepInArguments
    ): Promise<void> {
        try {
            await (args.granularity === 'instruction'
                ? mi.sendExecStepInstruction(this.gdb, args.threadId)
                : mi.sendExecStep(this.gdb, args.threadId));
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async stepOutRequest(
        response: DebugProtocol.StepOutResponse,
        args: DebugProtocol.StepOutArguments
    ): Promise<void> {
        try {
            await mi.sendExecFinish(this.gdb, {
                threadId: args.threadId,
                frameId: 0,
            });
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async pauseRequest(
        response: DebugProtocol.PauseResponse,
        args: DebugProtocol.PauseArguments
    ): Promise<void> {
        try {
            if (this.state === 'running') {
                await mi.sendExecInterrupt(this.gdb, args.threadId);
            }
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async threadsRequest(
        response: DebugProtocol.ThreadsResponse
    ): Promise<void> {
        try {
            if (!this.threads) {
                const result = await mi.sendThreadInfoRequest(this.gdb, {});
                this.threads = result.threads.map((thread) =>
                    GDBThread.fromMI(thread)
                );
            }
            response.body = { threads: this.threads };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async getStackFrames(
        threadId: number
    ): Promise<DebugProtocol.StackFrame[]> {
        const cached = this.stackFrames.get(threadId);
        if (cached) {
            return cached;
        }
        const { stack } = await mi.sendStackListFramesRequest(this.gdb, {
            threadId,
        });
        const frames = stack.map((frame) => {
            let source: Source | undefined;
            const file = frame.fullname ?? frame.file;
            if (file) {
                source = new Source(path.basename(frame.file ?? file), file);
            }
            const frameHandle = this.frameHandles.create({
                threadId,
                frameId: frame.level,
            });
            const sf: DebugProtocol.StackFrame = new StackFrame(
                frameHandle,
                frame.func || frame.from || '??',
                source,
                frame.line ?? 0
            );
            sf.instructionPointerReference = frame.addr;
            return sf;
        });
        this.stackFrames.set(threadId, frames);
        return frames;
    }

    protected async stackTraceRequest(
        response: DebugProtocol.StackTraceResponse,
        args: DebugProtocol.StackTraceArguments
    ): Promise<void> {
        try {
            const frames = await this.getStackFrames(args.threadId);
            const startFrame = args.startFrame ?? 0;
            const endFrame = args.levels
                ? startFrame + args.levels
                : frames.length;
            response.body = {
                stackFrames: frames.slice(startFrame, endFrame),
                totalFrames: frames.length,
            };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected getFrameReference(frameHandle: number): FrameReference {
        const frameRef: FrameReference | undefined =
            this.frameHandles.get(frameHandle);
        if (!frameRef) {
            throw new BridgeError(`Unknown frame id ${frameHandle}`);
        }
        return frameRef;
    }

    protected async scopesRequest(
        response: DebugProtocol.ScopesResponse,
        args: DebugProtocol.ScopesArguments
    ): Promise<void> {
        try {
            this.getFrameReference(args.frameId);
            const frameHandle = args.frameId;
            response.body = {
                scopes: [
                    new Scope(
                        'Local',
                        this.variableHandles.create({
                            type: 'frame',
                            frameHandle,
                        }),
                        false
                    ),
                    new Scope(
                        'Registers',
                        this.variableHandles.create({
                            type: 'registers',
                            frameHandle,
                        }),
                        true
                    ),
                ],
            };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected childReference(
        frameHandle: number,
        varobjName: string,
        numchild: string
    ): number {
        return parseInt(numchild, 10) > 0
            ? this.variableHandles.create({
                  type: 'object',
                  frameHandle,
                  varobjName,
              })
            : 0;
    }

    protected async getFrameVariables(
        frameHandle: number
    ): Promise<DebugProtocol.Variable[]> {
        const frameRef = this.getFrameReference(frameHandle);
        const { variables } = await mi.sendStackListVariables(this.gdb, {
            frameRef,
            printValues: 'simple-values',
        });
        const result: DebugProtocol.Variable[] = [];
        for (const variable of variables) {
            if (variable.value !== undefined) {
                result.push({
                    name: variable.name,
                    value: variable.value,
                    type: variable.type,
                    variablesReference: 0,
                });
                continue;
            }
            // Structured values are only shown through a variable object
            const varobj = await this.varManager.createVar(
                frameRef,
                variable.name
            );
            result.push({
                name: variable.name,
                value: varobj.value,
                type: varobj.type,
                variablesReference: this.childReference(
                    frameHandle,
                    varobj.varname,
                    varobj.numchild
                ),
            });
        }
        return result;
    }

    protected async getChildVariables(
        frameHandle: number,
        varobjName: string
    ): Promise<DebugProtocol.Variable[]> {
        const { children } = await mi.sendVarListChildren(this.gdb, {
            name: varobjName,
        });
        return children.map((child) => ({
            name: child.exp,
            value: child.value ?? '',
            type: child.type,
            variablesReference: this.childReference(
                frameHandle,
                child.name,
                child.numchild
            ),
        }));
    }

    protected async getRegisterVariables(
        frameHandle: number
    ): Promise<DebugProtocol.Variable[]> {
        const frameRef = this.getFrameReference(frameHandle);
        if (!this.registerNames) {
            this.registerNames = await mi.sendDataListRegisterNames(
                this.gdb,
                frameRef
            );
        }
        const names = this.registerNames;
        const values = await mi.sendDataListRegisterValues(this.gdb, {
            fmt: 'x',
            frameRef,
        });
        return values
            .filter((register) => !!names[register.number])
            .map((register) => ({
                name: names[register.number],
                value: register.value,
                variablesReference: 0,
            }));
    }

    protected async variablesRequest(
        response: DebugProtocol.VariablesResponse,
        args: DebugProtocol.VariablesArguments
    ): Promise<void> {
        try {
            const ref: VariableReference | undefined =
                this.variableHandles.get(args.variablesReference);
            if (!ref) {
                throw new BridgeError(
                    `Unknown variables reference ${args.variablesReference}`
                );
            }
            let variables: DebugProtocol.Variable[];
            switch (ref.type) {
                case 'frame':
                    variables = await this.getFrameVariables(ref.frameHandle);
                    break;
                case 'object':
                    variables = await this.getChildVariables(
                        ref.frameHandle,
                        ref.varobjName
                    );
                    break;
                case 'registers':
                    variables = await this.getRegisterVariables(
                        ref.frameHandle
                    );
                    break;
            }
            response.body = { variables };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async evaluateRequest(
        response: DebugProtocol.EvaluateResponse,
        args: DebugProtocol.EvaluateArguments
    ): Promise<void> {
        try {
            const frameRef =
                args.frameId !== undefined
                    ? this.getFrameReference(args.frameId)
                    : undefined;
            if (args.expression.startsWith('>')) {
                // Console output arrives as output events
                await mi.sendInterpreterExecConsole(this.gdb, {
                    frameRef,
                    command: args.expression.substring(1).trim(),
                });
                response.body = { result: '', variablesReference: 0 };
            } else {
                const { value } = await mi.sendDataEvaluateExpression(
                    this.gdb,
                    args.expression,
                    frameRef
                );
                response.body = { result: value ?? '', variablesReference: 0 };
            }
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(response, err);
        }
    }

    protected async sourceRequest(
        response: DebugProtocol.SourceResponse,
        args: DebugProtocol.SourceArguments
    ): Promise<void> {
        const file = args.source?.path;
        try {
            if (!file) {
                throw new BridgeError('Source request needs a source path');
            }
            response.body = { content: await readFile(file, 'utf8') };
            this.sendResponse(response);
        } catch (err) {
            this.sendBridgeErrorResponse(
                response,
                isNotFound(err)
                    ? new BridgeError(`Source file not found: ${file}`)
                    : err
            );
        }
    }

    protected async disconnectRequest(
        response: DebugProtocol.DisconnectResponse,
        _args: DebugProtocol.DisconnectArguments
    ): Promise<void> {
        this.disconnecting = true;
        this.gdb.abandonAll();
        const dropped = this.requestQueue.splice(0);
        if (dropped.length) {
            this.logger.verbose(
                `Dropping ${dropped.length} queued request(s) on disconnect`
            );
        }
        // Whatever was running is not going to be answered
        const active = this.activeRequest;
        this.activeRequest = undefined;
        active?.done();
        try {
            await this.gdb.stop();
        } catch (err) {
            this.logger.error(`Failed to stop GDB: ${errorMessage(err)}`);
        }
        this.state = 'terminated';
        this.sendEvent(new TerminatedEvent());
        this.sendResponse(response);
        this.resolveClosed(this.launchFailed ? 1 : 0);
    }
}
