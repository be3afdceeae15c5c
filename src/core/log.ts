// Diagnostics go to stderr; stdout carries nothing but the job id.
export type DiagnosticLog = (message: string) => void;

export const stderrLog: DiagnosticLog = (message) => {
  console.error(message);
};
