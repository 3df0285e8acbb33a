import { describe, it, expect } from "vitest"
import { AIMessage, HumanMessage, SystemMessage } from "@langchain/core/messages"

import { toLangChainMessages } from "../chat-client"

describe("toLangChainMessages", () => {
  it("should map each role to its LangChain message class", () => {
    const messages = toLangChainMessages([
      { role: "system", content: "You cook." },
      { role: "user", content: "Soup?" },
      { role: "assistant", content: "Lentil soup." }
    ])

    expect(messages[0]).toBeInstanceOf(SystemMessage)
    expect(messages[1]).toBeInstanceOf(HumanMessage)
    expect(messages[2]).toBeInstanceOf(AIMessage)
    expect(messages.map(message => message.content)).toEqual([
      "You cook.",
      "Soup?",
      "Lentil soup."
    ])
  })
})
