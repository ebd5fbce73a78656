/**
 * Matcher module exports.
 */

export {
	type Matcher,
	type MatcherOptions,
	matchAll,
	matchesOneOf,
	matchesOneOfGlobs,
	matchesNoneOf,
} from "./matcher.js";

export { translatePosixClasses } from "./posix.js";
