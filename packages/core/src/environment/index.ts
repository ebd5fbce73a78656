/**
 * Workflow environment exports.
 */

export {
	type RepositoryRef,
	workflow,
	runId,
	runNumber,
	action,
	isActions,
	actor,
	repository,
	eventName,
	eventPath,
	workspace,
	sha,
	ref,
	headRef,
	baseRef,
	serverUrl,
	apiUrl,
	graphqlUrl,
	getInput,
	parseRepository,
} from "./env.js";
