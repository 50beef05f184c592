// Type declarations for the parts of jstat used here (the package ships none)

declare module 'jstat' {
  export interface jStat {
    normal: {
      pdf(x: number, mean: number, std: number): number;
      cdf(x: number, mean: number, std: number): number;
      inv(p: number, mean: number, std: number): number;
    };

    studentt: {
      pdf(x: number, dof: number): number;
      cdf(x: number, dof: number): number;
    };

    sum(data: readonly number[]): number;
    mean(data: readonly number[]): number;
    /** Population variance, or the n - 1 sample variance when `sample` is true */
    variance(data: readonly number[], sample?: boolean): number;
  }

  const jStat: jStat;
  export default jStat;
}
