/**
 * @structmerge/cli
 *
 * structmerge command-line interface.
 *
 * This package is a CLI tool only - it has no public API exports.
 * Use it via the command line:
 *
 *   structmerge merge . feature-a feature-b
 *   structmerge file base.ts ours.ts theirs.ts -o merged.ts
 *   structmerge units src/user.ts
 *
 * The CLI entry point is src/bin/structmerge.ts
 */

export {};
