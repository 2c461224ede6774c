export class TopologyError extends Error {
  readonly roadId: number | null;

  constructor(message: string, roadId: number | null = null) {
    super(message);
    this.name = "TopologyError";
    this.roadId = roadId;
  }
}
