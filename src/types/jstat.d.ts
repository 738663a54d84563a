// Type declarations for the parts of jstat used by the density helpers

declare module 'jstat' {
  export interface jStat {
    normal: {
      pdf(x: number, mean: number, std: number): number;
    };

    exponential: {
      pdf(x: number, rate: number): number;
    };

    chisquare: {
      pdf(x: number, dof: number): number;
    };

    uniform: {
      pdf(x: number, a: number, b: number): number;
    };

    binomial: {
      pdf(k: number, n: number, p: number): number;
    };
  }

  const jStat: jStat;
  export default jStat;
}
