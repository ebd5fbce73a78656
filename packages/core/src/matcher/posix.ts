/**
 * POSIX bracket-expression support for regular expression patterns.
 *
 * Patterns may use character classes such as `[[:alpha:]]` or
 * `[^[:space:]]`. JavaScript reads `[:alpha:]` as a set of literal
 * characters, so each class is replaced by its ASCII ranges before the
 * pattern is compiled.
 */

const POSIX_CLASSES: ReadonlyMap<string, string> = new Map([
	["alnum", "0-9A-Za-z"],
	["alpha", "A-Za-z"],
	["ascii", "\\x00-\\x7f"],
	["blank", "\\t "],
	["cntrl", "\\x00-\\x1f\\x7f"],
	["digit", "0-9"],
	["graph", "!-~"],
	["lower", "a-z"],
	["print", " -~"],
	["punct", "!-\\/:-@\\[-`{-~"],
	["space", "\\t\\n\\v\\f\\r "],
	["upper", "A-Z"],
	["word", "0-9A-Za-z_"],
	["xdigit", "0-9A-Fa-f"],
]);

/**
 * Replace POSIX character classes inside bracket expressions with the
 * equivalent JavaScript ranges. Text outside brackets is left unchanged.
 *
 * @param pattern - Regular expression source
 * @returns Source accepted by `RegExp`
 * @throws SyntaxError for an unknown class name such as `[[:vowel:]]`
 */
export function translatePosixClasses(pattern: string): string {
	let result = "";
	let inBracket = false;
	let bracketStart = 0;

	for (let i = 0; i < pattern.length; i++) {
		const char = pattern[i];

		if (char === "\\") {
			result += pattern.slice(i, i + 2);
			i++;
			continue;
		}

		if (!inBracket) {
			if (char === "[") {
				inBracket = true;
				bracketStart = pattern[i + 1] === "^" ? i + 2 : i + 1;
			}
			result += char;
			continue;
		}

		if (char === "[" && pattern[i + 1] === ":") {
			const close = pattern.indexOf(":]", i + 2);
			if (close !== -1) {
				const name = pattern.slice(i + 2, close);
				const range = POSIX_CLASSES.get(name);
				if (range === undefined) {
					throw new SyntaxError(`invalid character class [:${name}:]`);
				}
				result += range;
				i = close + 1;
				continue;
			}
		}

		if (char === "]") {
			// A "]" right after "[" or "[^" is a literal member of the set.
			if (i === bracketStart) {
				result += "\\]";
				continue;
			}
			inBracket = false;
		}
		result += char;
	}

	return result;
}
