import { beforeEach } from "vitest";

import { createNode, setNode } from "@test/utils.js";

beforeEach(() => {
  setNode(createNode());
});
