// Process exit codes of the CLI

export const EXIT_OK = 0;
// Some objects failed
export const EXIT_PARTIAL = 1;
export const EXIT_ALL_FAILED = 2;
// The batch never started: invalid flags, manifests, kubeconfig or configuration
export const EXIT_INVALID = 3;
// A second SIGINT/SIGTERM cut the batch short, 128 + SIGINT
export const EXIT_INTERRUPTED = 130;
