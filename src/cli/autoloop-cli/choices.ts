import type { CommentTarget, LoopBranchMode, LoopMode, NotifyMode, PhoneView, SourceKind } from "../../autonomy/types.js";

export const LOOP_MODES: readonly LoopMode[] = ["report-only", "plan-then-fix", "fix-only"];
export const LOOP_BRANCH_MODES: readonly LoopBranchMode[] = ["base", "working"];
export const NOTIFY_MODES: readonly NotifyMode[] = ["summary-only", "summary-and-comment"];
export const COMMENT_TARGETS: readonly CommentTarget[] = ["auto", "pr", "commit"];
export const PHONE_VIEWS: readonly PhoneView[] = ["full", "compact", "trace", "actions"];
export const SOURCE_PREFERENCES: readonly SourceKind[] = ["triage-loop", "mutation-loop", "triage"];
