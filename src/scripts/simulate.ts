import { parseArgs } from "util";
import { ArqConfigError, runSimulation, type ArqConfig } from "../lib/arq";

const { values } = parseArgs({
  options: {
    messages: { type: "string", default: "20" },
    loss: { type: "string", default: "0" },
    corrupt: { type: "string", default: "0" },
    interval: { type: "string", default: "1000" },
    strategy: { type: "string", default: "selective-repeat" },
    window: { type: "string" },
    seqspace: { type: "string" },
    timeout: { type: "string" },
    "max-retries": { type: "string" },
    checksum: { type: "string" },
    strict: { type: "boolean", default: false },
    trace: { type: "string", default: "0" },
  },
});

function toNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    console.error(`✗ --${name} expects a number, got "${value}"`);
    process.exit(2);
  }
  return parsed;
}

const config: Partial<ArqConfig> = {
  name: "simulate",
  strictSequenceSpace: values.strict,
  trace: toNumber("trace", values.trace),
};
const windowSize = toNumber("window", values.window);
const sequenceSpace = toNumber("seqspace", values.seqspace);
const retransmissionTimeout = toNumber("timeout", values.timeout);
const maxRetransmissionAttempts = toNumber("max-retries", values["max-retries"]);
if (windowSize !== undefined) config.windowSize = windowSize;
if (sequenceSpace !== undefined) config.sequenceSpace = sequenceSpace;
if (retransmissionTimeout !== undefined) config.retransmissionTimeout = retransmissionTimeout;
if (maxRetransmissionAttempts !== undefined) {
  config.maxRetransmissionAttempts = maxRetransmissionAttempts;
}
if (values.strategy === "selective-repeat" || values.strategy === "go-back-n") {
  config.strategy = values.strategy;
} else {
  console.error(`✗ Unknown strategy "${values.strategy}"`);
  process.exit(2);
}
if (values.checksum !== undefined) {
  if (values.checksum !== "additive" && values.checksum !== "crc32") {
    console.error(`✗ Unknown checksum "${values.checksum}"`);
    process.exit(2);
  }
  config.checksum = values.checksum;
}

try {
  const report = runSimulation({
    messages: toNumber("messages", values.messages) ?? 20,
    lossProbability: toNumber("loss", values.loss),
    corruptionProbability: toNumber("corrupt", values.corrupt),
    meanInterval: toNumber("interval", values.interval),
    config,
  });

  const { statistics, channel } = report;
  console.log(`Simulated time:              ${report.elapsed.toFixed(3)}`);
  console.log(`Messages from application:   ${report.messagesGenerated}`);
  console.log(`Rejected, window full:       ${statistics.windowFull}`);
  console.log(`Frames sent:                 ${statistics.framesSent}`);
  console.log(`Frames resent:               ${statistics.framesResent}`);
  console.log(`Frames received correctly:   ${statistics.framesReceived}`);
  console.log(`Payloads delivered:          ${report.delivered.length}`);
  console.log(`ACKs received:               ${statistics.acksReceived}`);
  console.log(`New ACKs:                    ${statistics.newAcks}`);
  console.log(`Duplicate ACKs:              ${statistics.duplicateAcks}`);
  console.log(`Channel lost / corrupted:    ${channel.lost} / ${channel.corrupted}`);
  console.log(report.inOrder ? "✓ Delivered in order" : "✗ Delivery out of order");

  if (report.failure) {
    console.error(`✗ ${report.failure.message}`);
    process.exit(1);
  }
} catch (error) {
  if (error instanceof ArqConfigError) {
    console.error(`✗ ${error.message}`);
    process.exit(2);
  }
  throw error;
}
