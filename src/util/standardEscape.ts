/*********************************************************************
 * Copyright (c) 2022 Kichwa Coders Canada, Inc. and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/

// Quote the argument as a C string, escaping quotes, backslash and line breaks
export function standardEscape(arg: string): string {
    let result = '';
    for (const char of arg) {
        switch (char) {
            case '\\':
            case '"':
                result += `\\${char}`;
                break;
            case '\n':
                result += '\\n';
                break;
            case '\r':
                result += '\\r';
                break;
            case '\t':
                result += '\\t';
                break;
            default:
                result += char;
        }
    }
    return `"${result}"`;
}
