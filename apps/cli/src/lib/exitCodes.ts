export const EXIT_OK = 0;
/** At least one file failed */
export const EXIT_FAILURES = 1;
/** Missing dataset root or bad arguments */
export const EXIT_USAGE = 2;
