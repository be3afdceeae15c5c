// start -> metadata_parsed -> config_resolved -> directory_ensured -> command_built -> submitted -> id_extracted
export type SubmissionStage =
  | "start"
  | "metadata_parsed"
  | "config_resolved"
  | "directory_ensured"
  | "command_built"
  | "submitted"
  | "id_extracted";
