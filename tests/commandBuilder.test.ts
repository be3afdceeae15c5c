import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, stat, writeFile } from "fs/promises";
import path from "path";

import { UndefinedJobRule } from "../src/core/errors.js";
import type { SubmissionStage } from "../src/core/stages.js";
import { ScheduleConfig } from "../src/config/scheduleConfig.js";
import type { JobDescriptor } from "../src/job/jobDescriptor.js";
import { gridEngineBackend } from "../src/backends/gridEngine.js";
import { slurmBackend } from "../src/backends/slurm.js";
import { buildSubmission, defaultLogFiles, ensureOutputDirectory } from "../src/submission/commandBuilder.js";
import { makeTmpDir, qsubTable, removeTmpDir, sbatchTable } from "./helpers.js";

function job(overrides: Partial<JobDescriptor> = {}): JobDescriptor {
  return {
    scriptPath: "/tmp/jobs/align.sh",
    ruleName: "align",
    inputPaths: [],
    outputPaths: [],
    dependencies: null,
    ...overrides
  };
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

describe("defaultLogFiles", () => {
  it("derives log names from the first output", () => {
    expect(defaultLogFiles(job({ outputPaths: ["out/a.bam", "out/b.bam"] }), "slurm")).toEqual({
      out: "out/a.bam-slurm.out",
      err: "out/a.bam-slurm.err"
    });
  });

  it("falls back to the rule name without outputs", () => {
    expect(defaultLogFiles(job({ ruleName: "report" }), "qsub")).toEqual({
      out: "snakemake-report-qsub.out",
      err: "snakemake-report-qsub.err"
    });
  });
});

describe("ensureOutputDirectory", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await makeTmpDir("outdir");
  });

  afterAll(async () => {
    await removeTmpDir(tmpDir);
  });

  it("creates the directory of the first output", async () => {
    const first = path.join(tmpDir, "results", "nested", "a.bam");
    const dir = await ensureOutputDirectory(job({ outputPaths: [first, path.join(tmpDir, "other", "b.bam")] }));
    expect(dir).toBe(path.join(tmpDir, "results", "nested"));
    expect(await isDirectory(path.join(tmpDir, "results", "nested"))).toBe(true);
    expect(await isDirectory(path.join(tmpDir, "other"))).toBe(false);
  });

  it("accepts a directory that already exists", async () => {
    const existing = path.join(tmpDir, "existing");
    await mkdir(existing);
    await expect(ensureOutputDirectory(job({ outputPaths: [path.join(existing, "a.bam")] }))).resolves.toBe(existing);
  });

  it("lets sibling jobs create the same directory at once", async () => {
    const shared = path.join(tmpDir, "shared", "run");
    const [a, b] = await Promise.all([
      ensureOutputDirectory(job({ outputPaths: [path.join(shared, "a.bam")] })),
      ensureOutputDirectory(job({ outputPaths: [path.join(shared, "b.bam")] }))
    ]);
    expect(a).toBe(shared);
    expect(b).toBe(shared);
    expect(await isDirectory(shared)).toBe(true);
  });

  it("does nothing without outputs", async () => {
    await expect(ensureOutputDirectory(job())).resolves.toBeNull();
  });

  it("fails when a file is in the way", async () => {
    const blocker = path.join(tmpDir, "blocker");
    await writeFile(blocker, "x");
    await expect(ensureOutputDirectory(job({ outputPaths: [path.join(blocker, "a.bam")] }))).rejects.toThrow();
  });
});

describe("buildSubmission", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await makeTmpDir("build");
  });

  afterAll(async () => {
    await removeTmpDir(tmpDir);
  });

  it("resolves, ensures the directory, then builds the command", async () => {
    const output = path.join(tmpDir, "aligned", "s1.bam");
    const stages: SubmissionStage[] = [];
    const built = await buildSubmission({
      backend: slurmBackend,
      job: job({ ruleName: "sort", outputPaths: [output], dependencies: ["3"] }),
      config: new ScheduleConfig(sbatchTable),
      onStage: (s) => stages.push(s)
    });

    expect(stages).toEqual(["config_resolved", "directory_ensured", "command_built"]);
    expect(built.outputDir).toBe(path.join(tmpDir, "aligned"));
    expect(built.resolved.source).toBe("schedule_align");
    expect(built.logFiles).toEqual({ out: `${output}-slurm.out`, err: `${output}-slurm.err` });
    expect(built.command).toBe(
      `sbatch --output='${output}-slurm.out' --error='${output}-slurm.err' -d afterok:3 -A lab-account -p core -n 8 ` +
        "-t 0-12:0:00 -J snakemake_sort --mem=32G /opt/cluster/bin/run_job.sh '/tmp/jobs/align.sh'"
    );
  });

  it("uses rule-derived log names for jobs without outputs", async () => {
    const built = await buildSubmission({
      backend: gridEngineBackend,
      job: job({ ruleName: "report", dependencies: ["8", "9"] }),
      config: new ScheduleConfig(qsubTable)
    });
    expect(built.outputDir).toBeNull();
    expect(built.command).toBe(
      "qsub -o 'snakemake-report-qsub.out' -e 'snakemake-report-qsub.err' -hold_jid 8,9 -q short.q -pe smp 1 " +
        "-N snakemake_report /opt/cluster/bin/run_job.sh '/tmp/jobs/align.sh'"
    );
  });

  it("stops before touching the filesystem when the rule is unknown", async () => {
    const output = path.join(tmpDir, "never", "x.bam");
    const stages: SubmissionStage[] = [];
    await expect(
      buildSubmission({
        backend: gridEngineBackend,
        job: job({ ruleName: "unknown", outputPaths: [output] }),
        config: new ScheduleConfig(qsubTable),
        onStage: (s) => stages.push(s)
      })
    ).rejects.toBeInstanceOf(UndefinedJobRule);
    expect(stages).toEqual([]);
    expect(await isDirectory(path.join(tmpDir, "never"))).toBe(false);
  });
});
