// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export {
  createTarantoolCaller,
  tarantoolConnectionFactory,
} from "./connection.js";
export { mapTarantoolError } from "./errors.js";
