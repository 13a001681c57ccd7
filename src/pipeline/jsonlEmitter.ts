import type { PipelineEvent, PipelineEventEmitter } from "./events.js";

export class JsonLinesEventEmitter implements PipelineEventEmitter {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  emit(event: PipelineEvent): void {
    this.out.write(JSON.stringify(event) + "\n");
  }
}
