/**
 * @title Matcher Module
 * @description Inclusion predicates over archive entry paths.
 *
 * A Matcher decides whether an entry, identified by its effective (post-strip)
 * path, is extracted. Matchers are pure: compiled expressions are only read.
 *
 * @module matcher
 */

import { minimatch } from "minimatch";
import { getErrorMessage } from "../errors.js";
import { getDefaultLogger, type Logger } from "../logging.js";
import { translatePosixClasses } from "./posix.js";

/**
 * Predicate deciding whether a path is extracted.
 */
export type Matcher = (path: string) => boolean;

/**
 * Options for pattern matchers.
 */
export interface MatcherOptions {
	/** Receives a warning for every pattern that fails to compile. */
	logger?: Logger;
}

/**
 * Matcher that includes every path.
 */
export const matchAll: Matcher = () => true;

/**
 * Build a matcher that is true when any of the regular expressions finds a
 * match in the path. Patterns are not anchored; use `^` and `$` to anchor.
 * POSIX character classes such as `[[:alpha:]]` are accepted.
 *
 * A pattern that does not compile is reported as a warning and never matches.
 * With no patterns, nothing matches.
 *
 * @param patterns - Regular expression sources
 * @param options - Matcher options
 * @returns Matcher
 *
 * @example
 * ```typescript
 * const include = matchesOneOf(["^\\.github/", "\\.md$"]);
 * include("docs/README.md"); // true
 * ```
 */
export function matchesOneOf(patterns: readonly string[], options: MatcherOptions = {}): Matcher {
	const logger = options.logger ?? getDefaultLogger();
	const expressions: RegExp[] = [];

	for (const pattern of patterns) {
		try {
			expressions.push(new RegExp(translatePosixClasses(pattern)));
		} catch (error) {
			logger.warn(`unable to compile pattern ${pattern}: ${getErrorMessage(error)}`);
		}
	}

	return (path) => expressions.some((expression) => expression.test(path));
}

/**
 * Build a matcher that is true when any of the glob patterns matches the
 * whole path. Dotfiles are matched by wildcards.
 *
 * @param globs - Glob patterns (minimatch syntax)
 * @param options - Matcher options
 * @returns Matcher
 */
export function matchesOneOfGlobs(globs: readonly string[], options: MatcherOptions = {}): Matcher {
	const logger = options.logger ?? getDefaultLogger();
	const expressions: RegExp[] = [];

	for (const glob of globs) {
		const expression = minimatch.makeRe(glob, { dot: true });
		if (expression === false) {
			logger.warn(`unable to compile glob ${glob}`);
			continue;
		}
		expressions.push(expression);
	}

	return (path) => expressions.some((expression) => expression.test(path));
}

/**
 * Invert a matcher, for exclusion lists.
 */
export function matchesNoneOf(matcher: Matcher): Matcher {
	return (path) => !matcher(path);
}
