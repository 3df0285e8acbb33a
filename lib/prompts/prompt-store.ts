/**
 * Prompt Store
 *
 * Versioned chat templates looked up by type and label. The core only needs
 * `getPrompt(type, label?)` and `compile(vars)`; the local store serves the
 * templates bundled in `recipe-prompts.ts`.
 */

import { ValidationError } from "@/lib/errors/error-handler"
import type { ChatMessage } from "@/lib/llm/chat-client"
import {
  RECIPE_PROMPTS,
  type PromptDefinition,
  type PromptType
} from "./recipe-prompts"

export type PromptVariables = Record<string, string | number>

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * A compilable chat template
 */
export class PromptTemplate {
  readonly name: PromptType
  readonly version: number
  readonly label: string
  readonly messages: readonly ChatMessage[]

  constructor(
    name: PromptType,
    version: number,
    label: string,
    messages: ChatMessage[]
  ) {
    this.name = name
    this.version = version
    this.label = label
    this.messages = messages
  }

  /**
   * Names of the placeholders the template expects
   */
  get variables(): string[] {
    const names = new Set<string>()
    for (const message of this.messages) {
      for (const match of message.content.matchAll(PLACEHOLDER)) {
        names.add(match[1])
      }
    }
    return [...names]
  }

  /**
   * Fills every placeholder. Substituted values are not scanned again, so
   * recipe text containing braces is inserted verbatim.
   *
   * @throws ValidationError when a placeholder has no value
   */
  compile(variables: PromptVariables = {}): ChatMessage[] {
    const missing = this.variables.filter(name => !(name in variables))
    if (missing.length > 0) {
      throw new ValidationError(
        `Prompt "${this.name}" is missing variables: ${missing.join(", ")}`,
        missing
      )
    }

    return this.messages.map(message => ({
      role: message.role,
      content: message.content.replace(PLACEHOLDER, (_, name: string) =>
        String(variables[name])
      )
    }))
  }
}

export interface PromptStore {
  getPrompt(type: PromptType, label?: string): Promise<PromptTemplate>
}

/**
 * Serves bundled templates
 */
export class LocalPromptStore implements PromptStore {
  private readonly prompts: Record<PromptType, PromptDefinition>
  private readonly defaultLabel: string

  constructor(
    defaultLabel: string = "production",
    prompts: Record<PromptType, PromptDefinition> = RECIPE_PROMPTS
  ) {
    this.defaultLabel = defaultLabel
    this.prompts = prompts
  }

  async getPrompt(type: PromptType, label?: string): Promise<PromptTemplate> {
    const resolvedLabel = label ?? this.defaultLabel
    const definition = this.prompts[type]

    if (!definition.labels.includes(resolvedLabel)) {
      throw new ValidationError(
        `Prompt "${type}" has no version labelled "${resolvedLabel}"`,
        resolvedLabel
      )
    }

    return new PromptTemplate(
      type,
      definition.version,
      resolvedLabel,
      definition.messages
    )
  }
}
