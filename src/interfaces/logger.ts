/**
 * Output verbosity levels, ordered from least to most chatty
 */
export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}
