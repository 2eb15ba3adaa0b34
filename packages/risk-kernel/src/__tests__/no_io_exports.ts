// Negative acceptance: @floodrisk/risk-kernel must stay IO-free.
//
// Fetching, file access and config loading belong to apps/assessor. The kernel only
// receives already-shaped records, so none of its exports may look like an IO entrypoint.

import assert from "node:assert";

import * as pkg from "../index";

const forbiddenNamePatterns: RegExp[] = [
  /fetch/i,
  /load/i,
  /^read/i,
  /^write/i,
  /http/i,
  /file/i,
  /yaml/i
];

for (const k of Object.keys(pkg)) {
  for (const re of forbiddenNamePatterns) {
    assert.ok(!re.test(k), `forbidden export found in @floodrisk/risk-kernel: ${k}`);
  }
}

console.log("risk-kernel negative acceptance ok: no IO-shaped exports");
