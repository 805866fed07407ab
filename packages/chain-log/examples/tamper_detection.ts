// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * tamper_detection.ts: Demonstrates chain verification and tamper localisation.
 *
 * Shows how to:
 * - Log a series of sensor readings
 * - Verify the chain passes when rows are unmodified
 * - Detect an edited reading, a deleted reading and a replaced log
 *
 * Run: npm run example:tamper
 */

import {
  ChainLog,
  commit,
  encodeRecord,
  LOG_HEADER,
  MemoryAnchorStore,
  MemoryLogStore,
  ZERO_HASH,
} from "../src/index.js";
import type { LogRecord, VerificationResult } from "../src/index.js";

function printVerificationResult(result: VerificationResult): void {
  switch (result.status) {
    case "verified":
      console.log(`  VERIFIED: ${result.length} records`);
      break;
    case "tampered":
      console.log(`  TAMPERED: ${result.reason} at position ${result.position}`);
      console.log(`  ${result.message}`);
      break;
    case "anchor-stale":
      console.log(`  ANCHOR STALE: log is one commit ahead of the anchor (${result.length} records)`);
      break;
  }
}

async function main(): Promise<void> {
  console.log("=== Sensor chain: tamper detection example ===\n");

  const log = new MemoryLogStore();
  const chain = new ChainLog({ log, anchor: new MemoryAnchorStore() });
  await chain.initialize();

  const readings = ["20.0", "20.5", "20.7", "20.6", "20.9"];
  const records: LogRecord[] = [];
  for (const [index, value] of readings.entries()) {
    const timestamp = `2024-01-01 00:00:${String(index * 5).padStart(2, "0")}`;
    records.push(await chain.append(timestamp, value));
  }

  console.log("[Step 1] Verifying intact chain:");
  printVerificationResult(await chain.verify());
  const original = await log.readLines();

  console.log("\n[Step 2] Reading 3 edited in place:");
  const edited = original.slice();
  const third = records[2];
  if (third !== undefined) {
    edited[3] = encodeRecord({ ...third, value: "35.0" });
  }
  await log.rewrite(edited);
  printVerificationResult(await chain.verify());

  console.log("\n[Step 3] Reading 2 deleted:");
  await log.rewrite(original.filter((_, index) => index !== 2));
  printVerificationResult(await chain.verify());

  console.log("\n[Step 4] Log replaced with a freshly computed chain:");
  let prevHash = ZERO_HASH;
  const forged = [LOG_HEADER];
  for (const record of records) {
    const entryHash = commit(prevHash, record.timestamp, "19.0");
    forged.push(encodeRecord({ timestamp: record.timestamp, value: "19.0", prevHash, entryHash }));
    prevHash = entryHash;
  }
  await log.rewrite(forged);
  printVerificationResult(await chain.verify());

  console.log("\n[Step 5] Hash linkage for the genuine chain:");
  for (const [index, record] of records.entries()) {
    const prevDisplay = record.prevHash === ZERO_HASH ? "(genesis)" : record.prevHash.slice(0, 16) + "...";
    console.log(`  Record ${index + 1}: ${record.timestamp} = ${record.value}`);
    console.log(`    prevHash:  ${prevDisplay}`);
    console.log(`    entryHash: ${record.entryHash.slice(0, 32)}...`);
  }
}

main().catch((error: unknown) => {
  console.error("Error:", error);
  process.exit(1);
});
