export type { CheckerRunner, CheckerRequest } from './CheckerRunner.js';
export { MypyRunner, buildMypyArguments, locateConfigFile } from './MypyRunner.js';
