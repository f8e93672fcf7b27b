export type WorkflowRun = {
  id: number;
  status: string;
  conclusion: string;
  headSha: string;
  headBranch: string;
  url: string;
  createdAt: string;
  displayTitle: string;
};

export type WorkflowClientErrorKind = "connectivity" | "not_found" | "malformed" | "command_failed";

export class WorkflowClientError extends Error {
  readonly kind: WorkflowClientErrorKind;

  constructor(kind: WorkflowClientErrorKind, message: string) {
    super(message);
    this.name = "WorkflowClientError";
    this.kind = kind;
  }
}

export type CommentTargetRef = { kind: "pr"; id: number } | { kind: "commit"; id: string };

export type UpsertCommentResult = {
  id: number | null;
  url: string | null;
  action: "created" | "updated";
};

/**
 * Remote CI surface the control plane depends on. Implementations throw
 * {@link WorkflowClientError} for every failure.
 */
export type WorkflowClient = {
  listRuns: (params: { workflow?: string; branch?: string; limit: number }) => Promise<WorkflowRun[]>;
  viewRun: (runId: number) => Promise<WorkflowRun>;
  downloadArtifacts: (runId: number, destDir: string) => Promise<void>;
  dispatchWorkflow: (params: {
    workflow: string;
    ref: string;
    inputs: Record<string, string>;
  }) => Promise<string>;
  setVariable: (params: { name: string; value: string }) => Promise<void>;
  upsertComment: (params: {
    target: CommentTargetRef;
    marker: string;
    body: string;
  }) => Promise<UpsertCommentResult>;
  checkConnectivity: () => Promise<void>;
};
