import { defineConfig } from 'vitest/config';

// ── Coverage scope definitions per project ──
// Vitest does NOT support per-project coverage config — it's always global.
// We parse --project from CLI args and select the right scope dynamically.

const BASE_EXCLUDE = [
  'src/**/*.test.ts',
  'src/**/*.d.ts',
  'src/__tests__/**',
]

const L7_ENTRY_POINTS = [
  'src/L7-app/cli.ts',
]

interface CoverageScope {
  include: string[]
  exclude: string[]
  reportsDirectory: string
}

const COVERAGE_SCOPES: Record<string, CoverageScope> = {
  unit: {
    include: ['src/L0-pure/**/*.ts', 'src/L1-infra/**/*.ts', 'src/L2-clients/**/*.ts', 'src/L3-services/**/*.ts', 'src/L6-pipeline/**/*.ts'],
    exclude: [...BASE_EXCLUDE, 'src/L7-app/**/*.ts'],
    reportsDirectory: 'coverage/unit',
  },
  integration: {
    include: ['src/L1-infra/**/*.ts', 'src/L3-services/**/*.ts'],
    exclude: [...BASE_EXCLUDE],
    reportsDirectory: 'coverage/integration',
  },
}

// Detect which single project is running via --project CLI arg
function getActiveProject(): string | undefined {
  const projects: string[] = []
  for (let i = 0; i < process.argv.length; i++) {
    if (process.argv[i] === '--project' && i + 1 < process.argv.length) {
      projects.push(process.argv[++i])
    }
  }
  return projects.length === 1 ? projects[0] : undefined
}

const activeProject = getActiveProject()
const scope = activeProject ? COVERAGE_SCOPES[activeProject] : undefined

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary'],
      include: scope?.include ?? ['src/**/*.ts'],
      exclude: scope?.exclude ?? [...BASE_EXCLUDE, ...L7_ENTRY_POINTS],
      reportsDirectory: scope?.reportsDirectory ?? 'coverage',
    },
    testTimeout: 30000,

    // ── Per-tier test projects ──
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/__tests__/unit/**/*.test.ts'],
          setupFiles: ['src/__tests__/setup.ts'],
          testTimeout: 10_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration',
          include: ['src/__tests__/integration/**/*.test.ts'],
          setupFiles: ['src/__tests__/setup.ts'],
          testTimeout: 30_000,
        },
      },
    ],
  },
});
