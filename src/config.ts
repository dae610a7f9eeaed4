import 'dotenv/config';

type Env = Record<string, string | undefined>;

function isValidPort(value: string): boolean {
  if (!/^\d+$/.test(value)) return false;
  const port = parseInt(value, 10);
  return port >= 0 && port <= 65535;
}

export function findEnvProblems(env: Env = process.env): string[] {
  const problems: string[] = [];
  if (env.PORT !== undefined && !isValidPort(env.PORT)) {
    problems.push(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }
  if (env.HOST !== undefined && !env.HOST.trim()) {
    problems.push('HOST must not be empty');
  }
  return problems;
}

export function validateEnv(): void {
  const problems = findEnvProblems();

  if (problems.length > 0) {
    for (const problem of problems) console.error(`Invalid environment: ${problem}`);
    console.error('Fix your .env file. See .env.example');
    process.exit(1);
  }
}

export const config = {
  get PORT() { return parseInt(process.env.PORT || '8000', 10); },
  get HOST() { return process.env.HOST || '0.0.0.0'; },
  // Empty means the built-in roster in data/activities.json
  get ACTIVITIES_FILE() { return process.env.ACTIVITIES_FILE || ''; }
};
