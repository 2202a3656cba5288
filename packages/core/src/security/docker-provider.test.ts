import test from "node:test";
import assert from "node:assert/strict";
import { withContainerTimeout } from "./docker-provider.js";

test("commands run under an in-container timeout rounded up to whole seconds", () => {
    assert.deepEqual(withContainerTimeout(["bash", "-c", "make test"], 120_000), [
        "timeout",
        "--kill-after",
        "5",
        "120",
        "bash",
        "-c",
        "make test",
    ]);
    assert.deepEqual(withContainerTimeout(["true"], 1_500), ["timeout", "--kill-after", "5", "2", "true"]);
    assert.deepEqual(withContainerTimeout(["true"], 10), ["timeout", "--kill-after", "5", "1", "true"]);
});
