/**
 * CHANGE: Централизованные ре-экспорты Node built-ins для shell-слоя
 * WHY: Один источник импортов child_process/fs/util вместо повторяющихся import-блоков
 *
 * Инвариант: экспортируем совместимые объекты/функции, избегая `export *` для модулей с `export =`.
 */
import * as fsNS from "node:fs";

export { execFile } from "node:child_process";
export { promisify } from "node:util";

// CHANGE: Ре-экспорт через константы вместо `export *`
// WHY: node:fs в ряде версий типов использует `export =`, что несовместимо с `export *`
export const fs = fsNS;
