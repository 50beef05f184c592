/**
 * Reference distributions for p-values and critical values
 */

export type { Distribution } from './Distribution';

export {
  NormalDistribution,
  standardNormalCdf,
  standardNormalQuantile,
  twoSidedCriticalValue,
  powerQuantile,
  twoSidedNormalPValue,
} from './NormalDistribution';

export { StudentTDistribution, MAX_QUANTILE_ITERATIONS } from './StudentTDistribution';
