import { simulateReadableStream } from "ai";
import type { ModelMessage } from "ai";
import { MockLanguageModelV2 } from "ai/test";
import { describe, expect, it } from "vitest";

import {
  buildTurnMessages,
  createBankSupportAgent,
  parseSupportOutput,
} from "@/lib/agents/bank-support/agent";
import { buildSupportDependencies } from "@/lib/agents/bank-support/dependencies";
import type { SupportOutput } from "@/lib/agents/bank-support/schemas";
import { ModelResponseFormatError } from "@/lib/errors";

type GenerateResult = Awaited<ReturnType<MockLanguageModelV2["doGenerate"]>>;
type StreamResult = Awaited<ReturnType<MockLanguageModelV2["doStream"]>>;
type StreamPart = StreamResult["stream"] extends ReadableStream<infer T> ? T : never;

const usage = { inputTokens: 10, outputTokens: 20, totalTokens: 30 };

const deps = buildSupportDependencies("11111111-1111-4111-8111-111111111111");

const history: ModelMessage[] = [
  { role: "user", content: "Hi" },
  { role: "assistant", content: [{ type: "text", text: "Hello!" }] },
];

const balanceAnswer: SupportOutput = {
  supportAdvice: "Your balance is $1123.45.",
  blockCard: false,
  riskLevel: 1,
  followUpActions: [],
};

function textResult(text: string): GenerateResult {
  return { content: [{ type: "text", text }], finishReason: "stop", usage, warnings: [] };
}

function scriptedModel(results: GenerateResult[]): MockLanguageModelV2 {
  let call = 0;
  return new MockLanguageModelV2({
    doGenerate: async () => {
      const result = results[Math.min(call, results.length - 1)];
      call += 1;
      if (!result) {
        throw new Error("No scripted result");
      }
      return result;
    },
  });
}

function streamingModel(deltas: string[]): MockLanguageModelV2 {
  const chunks: StreamPart[] = [
    { type: "text-start", id: "text-1" },
    ...deltas.map((delta): StreamPart => ({ type: "text-delta", id: "text-1", delta })),
    { type: "text-end", id: "text-1" },
    { type: "finish", finishReason: "stop", usage },
  ];
  return new MockLanguageModelV2({
    doStream: async () => ({ stream: simulateReadableStream({ chunks }) }),
  });
}

async function collect(source: AsyncIterable<unknown>): Promise<unknown[]> {
  const items: unknown[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

describe("buildTurnMessages", () => {
  it("opens a new thread with the system prompt and customer name", async () => {
    const turn = await buildTurnMessages("What's my balance?", [], deps);

    expect(turn.map((message) => message.role)).toEqual(["system", "user"]);
    expect(turn[0]?.content).toContain("You are a support agent at First National Bank.");
    expect(turn[0]?.content).toContain("The customer's name is John Doe.");
    expect(turn[1]).toEqual({ role: "user", content: "What's my balance?" });
  });

  it("sends only the user message on later turns", async () => {
    const turn = await buildTurnMessages("Thanks", history, deps);
    expect(turn).toEqual([{ role: "user", content: "Thanks" }]);
  });
});

describe("parseSupportOutput", () => {
  it("accepts a well-formed answer", () => {
    expect(parseSupportOutput(JSON.stringify(balanceAnswer))).toEqual(balanceAnswer);
  });

  it("rejects text that is not JSON or misses fields", () => {
    expect(() => parseSupportOutput("Sure!")).toThrow(ModelResponseFormatError);
    expect(() => parseSupportOutput('{"supportAdvice":"hi"}')).toThrow(
      ModelResponseFormatError
    );
    expect(() =>
      parseSupportOutput(JSON.stringify({ ...balanceAnswer, riskLevel: 11 }))
    ).toThrow(ModelResponseFormatError);
  });
});

describe("bank support agent", () => {
  it("returns the structured output and the new messages of a first turn", async () => {
    const agent = createBankSupportAgent({
      getModel: () => scriptedModel([textResult(JSON.stringify(balanceAnswer))]),
    });

    const result = await agent.run("What's my balance?", [], deps);

    expect(result.output).toEqual(balanceAnswer);
    expect(result.newMessages.map((message) => message.role)).toEqual([
      "system",
      "user",
      "assistant",
    ]);
  });

  it("runs tools and records the tool exchange", async () => {
    const agent = createBankSupportAgent({
      getModel: () =>
        scriptedModel([
          {
            content: [
              {
                type: "tool-call",
                toolCallId: "call-1",
                toolName: "getBalance",
                input: '{"includePending":true}',
              },
            ],
            finishReason: "tool-calls",
            usage,
            warnings: [],
          },
          textResult(JSON.stringify(balanceAnswer)),
        ]),
    });

    const result = await agent.run("What's my balance?", history, deps);

    expect(result.output).toEqual(balanceAnswer);
    expect(result.newMessages.map((message) => message.role)).toEqual([
      "user",
      "assistant",
      "tool",
      "assistant",
    ]);

    const toolMessage = result.newMessages[2];
    expect(toolMessage?.role).toBe("tool");
    expect(toolMessage?.content).toEqual([
      expect.objectContaining({
        type: "tool-result",
        toolCallId: "call-1",
        toolName: "getBalance",
        output: { type: "json", value: 1123.45 },
      }),
    ]);
  });

  it("raises a format error when the model answers with free text", async () => {
    const agent = createBankSupportAgent({
      getModel: () => scriptedModel([textResult("I cannot help with that.")]),
    });

    await expect(agent.run("Hello", history, deps)).rejects.toThrow(ModelResponseFormatError);
  });

  it("streams partial outputs and exposes the final result", async () => {
    const agent = createBankSupportAgent({
      getModel: () =>
        streamingModel([
          '{"supportAdvice":"Your balance',
          ' is $1123.45.","blockCard":false,',
          '"riskLevel":1,"followUpActions":[]}',
        ]),
    });

    const run = agent.runStream("What's my balance?", history, deps);
    const partials = await collect(run.partialOutputs);

    expect(partials.length).toBeGreaterThan(0);
    expect(partials.at(-1)).toEqual(balanceAnswer);

    const result = await run.result();
    expect(result.output).toEqual(balanceAnswer);
    expect(result.newMessages.map((message) => message.role)).toEqual(["user", "assistant"]);
  });

  it("fails the stream when the final text does not match the output schema", async () => {
    const agent = createBankSupportAgent({
      getModel: () => streamingModel(["not json"]),
    });

    const run = agent.runStream("Hello", history, deps);

    await expect(collect(run.partialOutputs)).rejects.toThrow(ModelResponseFormatError);
    await expect(run.result()).rejects.toThrow("Agent stream was not consumed to completion");
  });
});
