// CHANGE: Configuration type definitions for the commit-range CLI
// WHY: Flags and environment are parsed in SHELL; CORE and APP only see these immutable records

/**
 * Снимок переменных окружения, прочитанный один раз на старте.
 *
 * Пустые строки нормализуются в undefined: выражения GitHub Actions
 * подставляют "" для отсутствующих полей события.
 *
 * @property eventName GITHUB_EVENT_NAME
 * @property eventPath GITHUB_EVENT_PATH (JSON с полным payload события)
 * @property commitList COMMIT_LIST (JSON-массив коммитов push)
 * @property prBaseSha PR_BASE_SHA
 * @property prHeadSha PR_HEAD_SHA
 * @property outputFile GITHUB_OUTPUT (файл для публикации outputs шага)
 * @property strict COMMIT_RANGE_STRICT или вход `strict` action (INPUT_STRICT)
 */
export interface EnvSnapshot {
	readonly eventName?: string;
	readonly eventPath?: string;
	readonly commitList?: string;
	readonly prBaseSha?: string;
	readonly prHeadSha?: string;
	readonly outputFile?: string;
	readonly strict: boolean;
}

/**
 * Опции командной строки после слияния с окружением.
 *
 * @property eventName Тип события (push, pull_request, ...)
 * @property eventPath Путь к JSON-файлу события
 * @property commitsJson JSON-массив коммитов для push
 * @property baseSha База pull request
 * @property headSha Голова pull request
 * @property cwd Рабочая директория git
 * @property outputName Имя публикуемого output
 * @property outputFile Файл GITHUB_OUTPUT; без него значение печатается в stdout
 * @property listCommits Дополнительно вывести коммиты диапазона
 * @property strict Неизвестный тип события считать ошибкой
 * @property help Напечатать справку и выйти
 */
export interface CLIOptions {
	readonly eventName?: string;
	readonly eventPath?: string;
	readonly commitsJson?: string;
	readonly baseSha?: string;
	readonly headSha?: string;
	readonly cwd: string;
	readonly outputName: string;
	readonly outputFile?: string;
	readonly listCommits: boolean;
	readonly strict: boolean;
	readonly help: boolean;
}
