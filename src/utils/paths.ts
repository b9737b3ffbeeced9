import path from 'path';

export const DETAILED_SUFFIX = '_detailed';
export const VERIFIED_SUFFIX = '_verified';

/** data/ohio.csv + "_detailed" -> data/ohio_detailed.csv */
export function deriveOutputPath(inputPath: string, suffix: string): string {
    const parsed = path.parse(inputPath);
    return path.join(parsed.dir, `${parsed.name}${suffix}${parsed.ext || '.csv'}`);
}

export function hasSuffix(filePath: string, suffix: string): boolean {
    return path.parse(filePath).name.toLowerCase().endsWith(suffix.toLowerCase());
}
