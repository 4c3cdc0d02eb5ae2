import { describe, expect, it, vi } from "vitest";
import {
  CANCELLED_MESSAGE,
  Dispatcher,
  TOOL_ERROR_PREFIX,
  UNKNOWN_TOOL_MESSAGE,
  roundLimitMessage,
  type DispatchEvent,
} from "../src/dispatch.ts";
import { API_ERROR_PREFIX } from "../src/llm.ts";
import { QUESTION_HEADER, assistantMessage, toolCall, userMessage } from "../src/messages.ts";
import { ToolRegistry } from "../src/registry.ts";
import type { Message, ToolArgs, ToolRegistration } from "../src/types.ts";
import { ScriptedAdapter } from "./test_utils.ts";

const echoTool = (handler: ToolRegistration["handler"] = (_prompt, args) => `echo: ${String(args.text)}`): ToolRegistration => ({
  name: "echo",
  description: "Echo the text back",
  parameters: { text: { type: "string", description: "Text to echo" } },
  required: ["text"],
  accepts: ["text"],
  handler,
});

function setup(replies: ConstructorParameters<typeof ScriptedAdapter>[0], tools: ToolRegistration[] = [echoTool()]) {
  const registry = new ToolRegistry();
  for (const tool of tools) registry.register(tool);
  const adapter = new ScriptedAdapter(replies);
  return { registry, adapter, dispatcher: new Dispatcher({ adapter, registry, systemPrompt: "system prompt" }) };
}

describe("Dispatcher", () => {
  it("ends with a final answer when the model calls no tool", async () => {
    const { adapter, dispatcher } = setup([assistantMessage("It lives in src/main.ts.")]);
    const result = await dispatcher.dispatch("Where is main?");
    expect(result.state).toBe("done");
    expect(result.reason).toBe("final_answer");
    expect(result.answer).toBe("It lives in src/main.ts.");
    expect(result.messages.map((m) => m.role)).toEqual(["user", "assistant"]);
    expect(result.messages[0].content).toBe(`${QUESTION_HEADER}Where is main?`);
    expect(adapter.calls).toBe(1);
  });

  it("sends system prompt, history and working set to the model", async () => {
    const { adapter, dispatcher } = setup([assistantMessage("ok")]);
    const history = [userMessage("earlier"), assistantMessage("earlier answer")];
    await dispatcher.dispatch("now", history);
    expect(adapter.contexts[0]).toEqual([
      { role: "system", content: "system prompt" },
      { role: "user", content: "earlier" },
      { role: "assistant", content: "earlier answer" },
      { role: "user", content: `${QUESTION_HEADER}now` },
    ]);
    expect(adapter.toolSets[0].map((t) => t.function.name)).toEqual(["echo"]);
  });

  it("runs a tool and feeds its result back", async () => {
    const { adapter, dispatcher } = setup([
      assistantMessage("", [toolCall("echo", { text: "ping" }, "call_1")]),
      assistantMessage("The tool said ping."),
    ]);
    const result = await dispatcher.dispatch("echo ping");
    expect(result.state).toBe("done");
    expect(result.messages.map((m) => m.role)).toEqual(["user", "assistant", "tool", "assistant"]);
    expect(result.messages[2]).toEqual({ role: "tool", content: "echo: ping", toolCallId: "call_1", name: "echo" });
    expect(result.answer).toBe("The tool said ping.");
    expect(result.toolRounds).toBe(1);
    expect(adapter.contexts[1].at(-1)).toEqual(result.messages[2]);
  });

  it("reports an unknown tool and lets the model try again", async () => {
    const { adapter, dispatcher } = setup([
      assistantMessage("", [toolCall("does_not_exist", {}, "call_1")]),
      assistantMessage("Sorry, answering directly."),
    ]);
    const result = await dispatcher.dispatch("question");
    expect(result.messages[2]).toEqual({
      role: "tool",
      content: UNKNOWN_TOOL_MESSAGE,
      toolCallId: "call_1",
      name: "does_not_exist",
    });
    expect(UNKNOWN_TOOL_MESSAGE).toBe("The LLM tried to call a function that does not exist.");
    expect(adapter.calls).toBe(2);
    expect(result.state).toBe("done");
  });

  it("turns a throwing handler into a tool message", async () => {
    const failing = echoTool(() => {
      throw new Error("disk on fire");
    });
    const { dispatcher } = setup(
      [assistantMessage("", [toolCall("echo", { text: "x" }, "call_1")]), assistantMessage("done")],
      [failing],
    );
    const result = await dispatcher.dispatch("question");
    expect(result.messages[2].content).toBe(`${TOOL_ERROR_PREFIX}disk on fire`);
    expect(result.messages[2].content).toBe("An error occurred while running the tool: disk on fire");
    expect(result.state).toBe("done");
  });

  it("also catches rejected async handlers", async () => {
    const failing = echoTool(async () => {
      throw new Error("timeout talking to index");
    });
    const { dispatcher } = setup(
      [assistantMessage("", [toolCall("echo", { text: "x" }, "call_1")]), assistantMessage("done")],
      [failing],
    );
    const result = await dispatcher.dispatch("question");
    expect(result.messages[2].content).toBe(`${TOOL_ERROR_PREFIX}timeout talking to index`);
  });

  it("reconciles arguments and binds the raw prompt", async () => {
    const seen: Array<{ prompt: string; args: ToolArgs }> = [];
    const tool: ToolRegistration = {
      name: "pair",
      description: "Takes a and b",
      parameters: {
        a: { type: "integer", description: "first" },
        b: { type: "integer", description: "second" },
      },
      accepts: ["user_prompt", "a", "b"],
      handler: (prompt, args) => {
        seen.push({ prompt, args });
        return "ok";
      },
    };
    const { dispatcher } = setup(
      [
        assistantMessage("", [toolCall("pair", { a: 1, c: 99, user_prompt: "spoofed" }, "call_1")]),
        assistantMessage("done"),
      ],
      [tool],
    );
    await dispatcher.dispatch("raw question");
    expect(seen).toEqual([{ prompt: "raw question", args: { a: 1, b: null } }]);
  });

  it("executes only the first of several tool calls", async () => {
    const handler = vi.fn((_prompt: string, args: ToolArgs) => `echo: ${String(args.text)}`);
    const { adapter, dispatcher } = setup(
      [
        assistantMessage("", [toolCall("echo", { text: "first" }, "call_1"), toolCall("echo", { text: "second" }, "call_2")]),
        assistantMessage("done"),
      ],
      [echoTool(handler)],
    );
    const result = await dispatcher.dispatch("question");
    expect(handler).toHaveBeenCalledTimes(1);
    expect(result.messages.filter((m) => m.role === "tool")).toEqual([
      { role: "tool", content: "echo: first", toolCallId: "call_1", name: "echo" },
    ]);
    expect(adapter.contexts[1].filter((m) => m.role === "tool")).toHaveLength(1);
  });

  it("stops at a degraded adapter message", async () => {
    const sentinel = userMessage(`${API_ERROR_PREFIX} connection refused`);
    const { adapter, dispatcher } = setup([sentinel]);
    const result = await dispatcher.dispatch("question");
    expect(result.state).toBe("failed");
    expect(result.reason).toBe("adapter_error");
    expect(result.answer).toBe("There was an API error. Please try again. connection refused");
    expect(result.messages).toHaveLength(2);
    expect(adapter.calls).toBe(1);
  });

  it("converts a throwing adapter into the degraded message", async () => {
    const { dispatcher } = setup([
      () => {
        throw new Error("socket hang up");
      },
    ]);
    const result = await dispatcher.dispatch("question");
    expect(result.state).toBe("failed");
    expect(result.answer).toBe(`${API_ERROR_PREFIX} socket hang up`);
  });

  it("retries a throwing adapter", async () => {
    const registry = new ToolRegistry();
    let attempts = 0;
    const adapter = new ScriptedAdapter([
      () => {
        attempts += 1;
        if (attempts === 1) throw new Error("flaky");
        return assistantMessage("recovered");
      },
    ]);
    const dispatcher = new Dispatcher({ adapter, registry, retries: 1 });
    const events: DispatchEvent[] = [];
    const result = await dispatcher.dispatch("question", [], { onEvent: (event) => events.push(event) });
    expect(result.answer).toBe("recovered");
    expect(attempts).toBe(2);
    expect(events.map((event) => event.type)).toEqual(["thinking", "model_retry", "model_response", "done"]);
    expect(events[1]).toEqual({ type: "model_retry", round: 1, attempt: 1, error: "flaky", terminal: false });
  });

  it("times out slow model calls", async () => {
    const registry = new ToolRegistry();
    const adapter = new ScriptedAdapter([() => new Promise<Message>((resolve) => setTimeout(() => resolve(assistantMessage("late")), 200))]);
    const dispatcher = new Dispatcher({ adapter, registry, requestTimeoutMs: 10 });
    const result = await dispatcher.dispatch("question");
    expect(result.state).toBe("failed");
    expect(result.answer).toBe(`${API_ERROR_PREFIX} Timed out after 10 ms`);
  });

  it("gives up after the configured number of tool rounds", async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool());
    const adapter = new ScriptedAdapter([assistantMessage("", [toolCall("echo", { text: "again" }, "call_n")])]);
    const dispatcher = new Dispatcher({ adapter, registry, maxToolRounds: 2 });
    const result = await dispatcher.dispatch("loop forever");
    expect(result.state).toBe("failed");
    expect(result.reason).toBe("round_limit");
    expect(result.toolRounds).toBe(2);
    expect(adapter.calls).toBe(3);
    expect(result.answer).toBe(roundLimitMessage(2));
    expect(result.answer).toBe("I could not reach a final answer within 2 tool calls.");
    expect(result.messages.map((m) => m.role)).toEqual(["user", "assistant", "tool", "assistant", "tool", "assistant", "assistant"]);
  });

  it("stops when cancelled", async () => {
    const controller = new AbortController();
    const { adapter, dispatcher } = setup([
      () => {
        controller.abort();
        return assistantMessage("", [toolCall("echo", { text: "x" }, "call_1")]);
      },
    ]);
    const result = await dispatcher.dispatch("question", [], { signal: controller.signal });
    expect(result.state).toBe("failed");
    expect(result.reason).toBe("cancelled");
    expect(result.answer).toBe(CANCELLED_MESSAGE);
    expect(result.messages.map((m) => m.role)).toEqual(["user", "assistant"]);
    expect(adapter.calls).toBe(1);
  });

  it("emits events in order and survives a throwing listener", async () => {
    const events: DispatchEvent["type"][] = [];
    const { dispatcher } = setup([
      assistantMessage("", [toolCall("echo", { text: "ping" }, "call_1")]),
      assistantMessage("done"),
    ]);
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const result = await dispatcher.dispatch("question", [], {
      onEvent: (event) => {
        events.push(event.type);
        if (event.type === "tool_finished") throw new Error("bad listener");
      },
    });
    expect(result.state).toBe("done");
    expect(events).toEqual(["thinking", "model_response", "tool_started", "tool_finished", "thinking", "model_response", "done"]);
    expect(errors).toHaveBeenCalledWith("dispatch listener failed: bad listener");
    errors.mockRestore();
  });
});
