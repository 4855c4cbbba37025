declare module "jstat" {
  export const jStat: {
    beta: {
      pdf(x: number, alpha: number, beta: number): number;
    };
  };
}
