/**
 * resume-forge
 *
 * Library entry point. The command line lives in ./cli.
 */

export * from './types';
export * from './shared';
export * from './config';
export * from './config/profile';
export * from './sources/githubCollector';
export * from './sources/jobSourceResolver';
export * from './sources/htmlText';
export * from './agents/jobExtractor';
export * from './agents/repositoryRanker';
export * from './agents/contentGenerator';
export * from './selection/selectionController';
export * from './selection/terminalIO';
export * from './latex/escape';
export * from './latex/locale';
export * from './latex/assembler';
export * from './latex/compiler';
export * from './pipeline';
