interface UnresolvablePattern {
  readonly label: string;
  readonly pattern: RegExp;
}

/** Constructs whose deletion targets cannot be known without running them */
export const UNRESOLVABLE_PATTERNS: readonly UnresolvablePattern[] = [
  { label: '$(...) substitution', pattern: /\$\(/ },
  { label: 'backtick substitution', pattern: /`/ },
  { label: 'eval', pattern: /\beval\b/ },
  { label: 'base64 piped into a shell', pattern: /base64.*\|\s*(?:ba)?sh/ },
  // Python
  { label: 'os.remove()', pattern: /os\.remove\(/ },
  { label: 'os.unlink()', pattern: /os\.unlink\(/ },
  { label: 'shutil.rmtree()', pattern: /shutil\.rmtree\(/ },
  { label: '.unlink()', pattern: /\.unlink\(\)/ },
  // Node
  { label: 'fs.unlinkSync()', pattern: /fs\.unlinkSync\(/ },
  { label: 'fs.rmdirSync()', pattern: /fs\.rmdirSync\(/ },
  { label: 'fs.rmSync()', pattern: /fs\.rmSync\(/ },
  { label: 'fs.promises.unlink()', pattern: /fs\.promises\.unlink\(/ },
];

/** Label of the first construct found, or null */
export function findUnresolvable(command: string): string | null {
  for (const { label, pattern } of UNRESOLVABLE_PATTERNS) {
    if (pattern.test(command)) {
      return label;
    }
  }
  return null;
}

export function hasUnresolvable(command: string): boolean {
  return findUnresolvable(command) !== null;
}
