// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { createAcquireOperation } from "./acquire.js";
export { createReleaseOperation } from "./release.js";
export { createStatisticsOperation } from "./statistics.js";
export { createUpdateOperation } from "./update.js";
