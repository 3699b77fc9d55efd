/*********************************************************************
 * Copyright (c) 2025 Arm Ltd. and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

import { ILogger, logger, LogLevel } from '@vscode/debugadapter/lib/logger';

/**
 * Debug adapter logger that tags every message with the name of the
 * session (or session part) it comes from. Writes to the adapter wide
 * logger unless given a sink of its own.
 */
export class NamedLogger implements ILogger {
    constructor(
        public readonly name?: string,
        protected readonly _logger: ILogger = logger
    ) {}

    /** Where the tagged messages end up. */
    get sink(): ILogger {
        return this._logger;
    }

    protected format(msg: string): string {
        return this.name ? `[${this.name}] ${msg}` : msg;
    }

    /** Logger for one part of this session, named `<name>:<part>`. */
    child(part: string): NamedLogger {
        return new NamedLogger(
            this.name ? `${this.name}:${part}` : part,
            this._logger
        );
    }

    log(msg: string, level?: LogLevel): void {
        this._logger.log(this.format(msg), level);
    }
    verbose(msg: string): void {
        this._logger.verbose(this.format(msg));
    }
    warn(msg: string): void {
        this._logger.warn(this.format(msg));
    }
    error(msg: string): void {
        this._logger.error(this.format(msg));
    }
}
