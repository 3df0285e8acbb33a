import { describe, it, expect } from "vitest"

import { loadSettings } from "@/lib/config/settings"
import { LocalPromptStore } from "@/lib/prompts/prompt-store"
import type { ScoredRecipe } from "@/lib/rag/vector-index/types"
import { createIndexEntry } from "@/lib/recipes/index-entry"
import { ScriptedChatClient, makeRecipe } from "@/lib/testing/fakes"

import { parseDataset } from "../dataset"
import {
  createJudgeContext,
  formatJudgeContext,
  judgeFaithfulness,
  judgeRelevancy
} from "../judges"

const HIT: ScoredRecipe = {
  id: "dal",
  score: 0.8,
  payload: createIndexEntry(
    makeRecipe({
      name: "Dal",
      recipeIngredients: [{ display: "200 g red lentils" }],
      recipeInstructions: [{ text: "Simmer until soft." }]
    })
  )
}

function judge(client: ScriptedChatClient) {
  return {
    chatClient: client,
    promptStore: new LocalPromptStore(),
    chatOptions: { model: "judge-model", temperature: 0 }
  }
}

describe("createJudgeContext", () => {
  it("should reuse the service clients and prefer the judge model", () => {
    const settings = loadSettings({ JUDGE_MODEL: "judge-model", LLM_SEED: "7" })
    const chatClient = new ScriptedChatClient({})
    const promptStore = new LocalPromptStore()

    const context = createJudgeContext({ settings, chatClient, promptStore })

    expect(context.chatClient).toBe(chatClient)
    expect(context.promptStore).toBe(promptStore)
    expect(context.chatOptions).toEqual({
      model: "judge-model",
      temperature: 0.2,
      seed: 7
    })
    expect(context.promptLabel).toBe("production")
  })

  it("should fall back to the chat model", () => {
    const context = createJudgeContext({
      settings: loadSettings({ LLM_MODEL: "chat-model" }),
      chatClient: new ScriptedChatClient({}),
      promptStore: new LocalPromptStore()
    })

    expect(context.chatOptions.model).toBe("chat-model")
  })
})

describe("formatJudgeContext", () => {
  it("should render one delimited block per recipe", () => {
    expect(formatJudgeContext([HIT])).toEqual({
      context:
        "[RECIPE START]\nName: Dal\nRating: Unknown\nDescription: \n" +
        "Ingredients:\n- 200 g red lentils\nInstructions:\n- Simmer until soft.\n[RECIPE END]",
      recipeNames: ["Dal"]
    })
  })
})

describe("judges", () => {
  it("should score relevancy on the question and answer", async () => {
    const client = new ScriptedChatClient({
      structured: () => ({ score: 5, reason: "direct answer" })
    })

    const judgement = await judgeRelevancy("lentil ideas?", "Make dal.", judge(client))

    expect(judgement).toEqual({ score: 5, reason: "direct answer" })
    expect(client.calls[0].messages[1].content).toBe(
      "Question: lentil ideas?\n\nAnswer: Make dal."
    )
    expect(client.calls[0].options.tags).toEqual(["judge", "relevancy"])
  })

  it("should reject scores outside 1 to 5", async () => {
    const client = new ScriptedChatClient({
      structured: () => ({ score: 9, reason: "too high" })
    })

    await expect(judgeRelevancy("q", "a", judge(client))).rejects.toThrow()
  })

  it("should judge faithfulness against the context", async () => {
    const client = new ScriptedChatClient({
      structured: () => ({ verdict: "hallucination", reason: "invented coconut" })
    })

    const judgement = await judgeFaithfulness(
      "lentil ideas?",
      "CTX",
      "Dal with coconut.",
      judge(client)
    )

    expect(judgement.verdict).toBe("hallucination")
    expect(client.calls[0].messages[1].content).toBe(
      "Context:\nCTX\n\nQuestion: lentil ideas?\n\nAnswer: Dal with coconut."
    )
  })
})

describe("parseDataset", () => {
  it("should validate rows and apply the limit", () => {
    const rows = parseDataset(
      [
        { id: "q1", question: "soup?", expected_properties: '{"is_healthy": true}' },
        { question: "cake?" }
      ],
      1
    )

    expect(rows).toEqual([
      { id: "q1", question: "soup?", expected_properties: '{"is_healthy": true}' }
    ])
  })

  it("should reject rows without a question", () => {
    expect(() => parseDataset([{ id: 1 }])).toThrow(/Invalid evaluation dataset/)
  })
})
