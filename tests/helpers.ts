import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

export async function makeTmpDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `cluster-submit-${label}-`));
}

export async function removeTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeJobScript(
  dir: string,
  name: string,
  props: { rule: string; input: string[]; output: string[] }
): Promise<string> {
  const scriptPath = path.join(dir, name);
  const properties = { type: "single", ...props, params: {}, threads: 1, jobid: 3 };
  const text = [
    "#!/bin/sh",
    `# properties = ${JSON.stringify(properties)}`,
    `cd ${dir} && snakemake --force ${props.output.join(" ")}`,
    ""
  ].join("\n");
  await writeFile(scriptPath, text, "utf8");
  return scriptPath;
}

export const qsubTable = {
  qsub_general: { wrapper_script: "/opt/cluster/bin/run_job.sh" },
  schedule_align: { queue: "all.q", threads: 8, extra_parameters: "-l h_vmem=4G" },
  schedule_sort: "schedule_align",
  schedule_report: { queue: "short.q", threads: 1 }
};

export const sbatchTable = {
  sbatch_general: { wrapper_script: "/opt/cluster/bin/run_job.sh", account: "lab-account" },
  schedule_align: { partition: "core", cores: 8, days: 0, hours: 12, minutes: 0, extra_parameters: "--mem=32G" },
  schedule_sort: "schedule_align",
  schedule_report: { partition: "devel", cores: 1, days: 0, hours: 1, minutes: 30 }
};
