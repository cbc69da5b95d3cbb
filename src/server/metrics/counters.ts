type CodeCounter = Record<string, number>;

export class Counters {
  wsCloseTotal: CodeCounter = {};
  requestsTotal: CodeCounter = {};
  collaboratorFailureTotal: CodeCounter = {};
  reconnectTotal = 0;
  clientIdConflictTotal = 0;
  validationFailureTotal = 0;
  malformedMessageTotal = 0;

  markWsClose(code: number): void {
    bump(this.wsCloseTotal, String(code));
  }

  markRequest(kind: string): void {
    bump(this.requestsTotal, kind);
  }

  markCollaboratorFailure(kind: string): void {
    bump(this.collaboratorFailureTotal, kind);
  }
}

function bump(counter: CodeCounter, key: string): void {
  counter[key] = (counter[key] ?? 0) + 1;
}
