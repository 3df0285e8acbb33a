import { describe, it, expect } from "vitest"

import { ValidationError } from "@/lib/errors/error-handler"

import { LocalPromptStore, PromptTemplate } from "../prompt-store"
import { PromptType, RECIPE_PROMPTS } from "../recipe-prompts"

describe("PromptTemplate", () => {
  const template = new PromptTemplate(PromptType.METRIC_RELEVANCY, 1, "production", [
    { role: "system", content: "Judge {query}." },
    { role: "user", content: "Question: {query}\n\nAnswer: {answer}" }
  ])

  it("should list each placeholder once", () => {
    expect(template.variables).toEqual(["query", "answer"])
  })

  it("should fill every placeholder", () => {
    expect(template.compile({ query: "soup?", answer: "Yes" })).toEqual([
      { role: "system", content: "Judge soup?." },
      { role: "user", content: "Question: soup?\n\nAnswer: Yes" }
    ])
  })

  it("should insert values containing braces verbatim", () => {
    const [, user] = template.compile({ query: "{answer}", answer: "A" })

    expect(user.content).toBe("Question: {answer}\n\nAnswer: A")
  })

  it("should name the missing variables", () => {
    expect(() => template.compile({ query: "q" })).toThrow(
      new ValidationError('Prompt "metric-relevancy" is missing variables: answer')
    )
  })
})

describe("LocalPromptStore", () => {
  it("should serve every bundled prompt under the default label", async () => {
    const store = new LocalPromptStore()

    for (const type of Object.values(PromptType)) {
      const prompt = await store.getPrompt(type)
      expect(prompt.label).toBe("production")
      expect(prompt.version).toBe(RECIPE_PROMPTS[type].version)
    }
  })

  it("should expect the generation variables", async () => {
    const prompt = await new LocalPromptStore().getPrompt(PromptType.CHAT_GENERATION)

    expect(prompt.variables.sort()).toEqual(["context_text", "external_url", "query"])
  })

  it("should reject an unknown label", async () => {
    await expect(
      new LocalPromptStore("staging").getPrompt(PromptType.CULINARY_BRAINSTORM)
    ).rejects.toThrow('Prompt "culinary-brainstorm" has no version labelled "staging"')
  })

  it("should let the call override the default label", async () => {
    const prompt = await new LocalPromptStore("staging").getPrompt(
      PromptType.CULINARY_BRAINSTORM,
      "development"
    )

    expect(prompt.label).toBe("development")
  })
})
