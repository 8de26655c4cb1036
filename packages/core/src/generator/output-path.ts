import * as path from 'node:path';

/** Suffix of the default output file name */
export const OUTPUT_SUFFIX = '_string_gen.go';

export interface OutputPathOptions {
  dir: string;
  typeName: string;
  packageName: string;
  /** Explicit output file; relative paths resolve against the working directory */
  output?: string | undefined;
  /** Whether the directory holds more than one package */
  multiplePackages: boolean;
}

/**
 * Default output name: `<dir>/<lower-case type>_string_gen.go`
 */
export function defaultOutputPath(dir: string, typeName: string): string {
  return path.join(dir, `${typeName}${OUTPUT_SUFFIX}`.toLowerCase());
}

/**
 * Where the generated file for one package goes.
 *
 * With several packages in the directory the package name is prefixed to the
 * file's base name so each package gets its own file.
 */
export function resolveOutputPath(options: OutputPathOptions): string {
  const target = options.output
    ? path.resolve(options.output)
    : defaultOutputPath(options.dir, options.typeName);

  if (!options.multiplePackages) {
    return target;
  }
  return path.join(path.dirname(target), `${options.packageName}_${path.basename(target)}`);
}
