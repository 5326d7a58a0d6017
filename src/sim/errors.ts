import type { Cell } from "../grid/grid.js";

/** 맵·설정·시나리오가 잘못된 경우. 해당 에피소드는 시작되지 않는다. */
export class ConfigurationError extends Error {
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

/** step 호출 자체가 잘못된 경우 (행동 개수 불일치, 에피소드 밖 호출 등). 상태는 바뀌지 않는다. */
export class InvalidInvocationError extends Error {
  public expected?: number;
  public received?: number;

  constructor(message: string, expected?: number, received?: number) {
    super(message);
    this.name = "InvalidInvocationError";
    this.expected = expected;
    this.received = received;
  }
}

export class InvalidPlacementError extends Error {
  public cell: Cell;

  constructor(message: string, cell: Cell) {
    super(message);
    this.name = "InvalidPlacementError";
    this.cell = cell;
  }
}
