/*********************************************************************
 * Copyright (c) 2018 QNX Software Systems and others
 *
 * This program and the accompanying materials are made
 * available under the terms of the Eclipse Public License 2.0
 * which is available at https://www.eclipse.org/legal/epl-2.0/
 *
 * SPDX-License-Identifier: EPL-2.0
 *********************************************************************/
export * from './base';
export * from './breakpoint';
export * from './data';
export * from './exec';
export * from './interpreter';
export * from './stack';
export * from './symbols';
export * from './target';
export * from './thread';
export * from './var';
