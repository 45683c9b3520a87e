export type PipelineStage =
  | "extracted"
  | "keyword_scored"
  | "model_refined"
  | "ranked"
  | "truncated"
  | "assembled";

const STAGE_ORDER: readonly PipelineStage[] = [
  "extracted",
  "keyword_scored",
  "model_refined",
  "ranked",
  "truncated",
  "assembled",
];

const OPTIONAL_STAGES: ReadonlySet<PipelineStage> = new Set(["model_refined"]);

export class PipelineStageTracker {
  private readonly visited: PipelineStage[] = [];

  get current(): PipelineStage | null {
    return this.visited[this.visited.length - 1] ?? null;
  }

  get history(): readonly PipelineStage[] {
    return this.visited;
  }

  advance(next: PipelineStage): void {
    const from = this.current === null ? -1 : STAGE_ORDER.indexOf(this.current);
    const to = STAGE_ORDER.indexOf(next);

    if (to <= from) {
      throw new Error(`Illegal stage transition: ${this.current ?? "start"} -> ${next}`);
    }
    for (let index = from + 1; index < to; index += 1) {
      if (!OPTIONAL_STAGES.has(STAGE_ORDER[index])) {
        throw new Error(
          `Illegal stage transition: ${this.current ?? "start"} -> ${next} skips ${STAGE_ORDER[index]}`,
        );
      }
    }

    this.visited.push(next);
  }
}
