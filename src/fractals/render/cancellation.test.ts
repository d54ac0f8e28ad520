import { describe, expect, it } from "vitest";

import { CancellationToken } from "./cancellation";

describe("CancellationToken", () => {
  it("should start uncancelled", () => {
    expect(new CancellationToken().isCancelled).toBe(false);
  });

  it("should be observed through every token attached to the same memory", () => {
    const token = new CancellationToken();
    const attached = CancellationToken.fromShared(token.shared);

    token.cancel();

    expect(token.isCancelled).toBe(true);
    expect(attached.isCancelled).toBe(true);
  });
});
