// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

// tarantool-driver ships no type declarations; only the surface used here is declared.
declare module "tarantool-driver" {
  import { EventEmitter } from "node:events";

  interface TarantoolConnectionOptions {
    host?: string;
    port?: number;
    username?: string;
    password?: string;
    /** Connect timeout in ms */
    timeout?: number;
    /** Defer connecting until connect() or the first request */
    lazyConnect?: boolean;
  }

  class TarantoolConnection extends EventEmitter {
    constructor(options?: TarantoolConnectionOptions);
    connect(): Promise<unknown>;
    call(functionName: string, ...args: unknown[]): Promise<unknown>;
    disconnect(): void;
  }

  export = TarantoolConnection;
}
