export { proportionsZTest } from './proportionsZTest';
export { ttestIndWelch } from './ttestIndWelch';
export { runTwoSampleTest } from './runTwoSampleTest';
