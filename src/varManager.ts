import { IGDBBackend } from './types/gdb';
import { MIVarCreateResponse } from './mi/var';
import { sendVarCreate, sendVarDelete } from './mi/var';
import { FrameReference } from './types/session';
import { NamedLogger } from './namedLogger';
import { errorMessage } from './gdb/errors';

export interface VarObjType {
    varname: string;
    expression: string;
    numchild: string;
    value: string;
    type: string;
}

/**
 * Tracks the GDB variable objects created for structured values. They
 * describe the inferior at one stop only, so once the session moves on
 * they are queued for deletion and deleted before the next request runs
 * its own commands.
 */
export class VarManager {
    protected readonly variableMap = new Map<string, VarObjType>();
    protected staleVars: string[] = [];

    constructor(
        protected readonly gdb: IGDBBackend,
        protected readonly logger: NamedLogger
    ) {}

    public getKey(frameRef: FrameReference, expression: string): string {
        return `frame${frameRef.frameId}_thread${frameRef.threadId}_${expression}`;
    }

    public getVar(
        frameRef: FrameReference,
        expression: string
    ): VarObjType | undefined {
        return this.variableMap.get(this.getKey(frameRef, expression));
    }

    /**
     * Return the variable object for an expression in a frame, creating
     * it the first time it is asked for since the last stop.
     */
    public async createVar(
        frameRef: FrameReference,
        expression: string
    ): Promise<VarObjType> {
        const existing = this.getVar(frameRef, expression);
        if (existing) {
            return existing;
        }
        const response: MIVarCreateResponse = await sendVarCreate(this.gdb, {
            frameRef,
            expression,
        });
        const varobj: VarObjType = {
            varname: response.name,
            expression,
            numchild: response.numchild,
            value: response.value,
            type: response.type,
        };
        this.variableMap.set(this.getKey(frameRef, expression), varobj);
        return varobj;
    }

    /**
     * Forget every variable object and queue it for deletion. Children
     * go with their parent.
     */
    public invalidate() {
        for (const varobj of this.variableMap.values()) {
            this.staleVars.push(varobj.varname);
        }
        this.variableMap.clear();
    }

    public async deleteStaleVars(): Promise<void> {
        while (this.staleVars.length) {
            const varname = this.staleVars.shift();
            if (varname === undefined) {
                break;
            }
            try {
                await sendVarDelete(this.gdb, { varname });
            } catch (err) {
                this.logger.warn(
                    `Failed to delete variable object ${varname}: ${errorMessage(
                        err
                    )}`
                );
            }
        }
    }
}
