import { spawnSync } from "child_process";

export interface SubmitResult {
  // stdout and stderr of the submission tool, interleaved as written
  output: string;
  exitStatus: number | null;
}

export interface JobSubmitter {
  submit(command: string): Promise<SubmitResult>;
}

/**
 * Runs the submission command through /bin/sh and waits for it. There is no
 * timeout: a hung qsub/sbatch hangs the invocation.
 */
export class ShellSubmitter implements JobSubmitter {
  constructor(private readonly shell: string = "/bin/sh") {}

  async submit(command: string): Promise<SubmitResult> {
    const res = spawnSync(this.shell, ["-c", `exec 2>&1\n${command}`], {
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env
    });
    if (res.error) {
      throw res.error;
    }
    const output = res.stdout ? res.stdout.toString("utf8") : "";
    return { output, exitStatus: res.status };
  }
}
