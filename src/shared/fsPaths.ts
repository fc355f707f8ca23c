import path from "node:path";

export function resolveWorkRoot(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.HARNESS_ROOT;
  if (explicit && explicit.trim().length > 0) {
    return path.resolve(process.cwd(), explicit);
  }
  return process.cwd();
}

export function resolveFromRoot(root: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(root, target);
}
