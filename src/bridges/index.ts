/**
 * Cross-language bridges
 */

export { CrossLanguageResolver } from './cross-language-resolver';
export { HttpToPythonBridge, buildEndpointIndex, endpointKey } from './http-to-python';
export { ShellToPythonScriptBridge, candidateModules } from './script-to-python';
export { addReference } from './types';
export type { LanguageBridge, CrossReferences } from './types';
