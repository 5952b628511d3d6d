/**
 * @fileoverview Interpreter barrel exports
 *
 * @module interpreters
 */

export {
    OpenAIInterpreter,
    buildInterpretationPrompt,
    type Interpretation,
    type InterpretationRequest,
    type OpenAIInterpreterConfig,
} from "./openai-interpreter.js";
