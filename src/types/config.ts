/** Full adapter configuration (config.yaml). */
export type DispatchConfig = {
  samtools: {
    /** Executable resolved on PATH unless absolute. */
    binary: string;
    cwd: string | null;
  };
  diagnostics: {
    /** Extra stderr prefixes treated as benign, on top of the built-in set. */
    benign_prefixes: string[];
    replace_defaults: boolean;
  };
};
