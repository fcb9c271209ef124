import { UNSTABLE_OPTIONS, UNSTABLE_ORIGINAL_MANIFEST } from './constant';
import { ConflictingFlagsError, UnknownOptionError } from './error';
import type { UnstableFlags, UnstableOptions, Verbosity, VerbosityFlags } from './type';

export const validateVerbosity = (flags: VerbosityFlags): Verbosity | undefined => {
  if (flags.quiet && flags.verbose) {
    throw new ConflictingFlagsError();
  }

  if (flags.quiet) {
    return 'quiet';
  }
  if (flags.verbose) {
    return 'verbose';
  }
  return undefined;
};

const isUnstableOption = (option: string): boolean => {
  return UNSTABLE_OPTIONS.some((known) => known === option);
};

export const validateUnstableOptions = (value: UnstableOptions): UnstableFlags => {
  const invalidOptions = value.options.filter((option) => !isUnstableOption(option));
  if (invalidOptions.length > 0) {
    throw new UnknownOptionError(invalidOptions);
  }

  const flags: UnstableFlags = {
    originalManifest: value.options.includes(UNSTABLE_ORIGINAL_MANIFEST),
  };
  return flags;
};
