export { chooseMove, chooseMoveAsync, createPlayer } from "./dispatcher";
export { weakMove } from "./weak";
export { mediumMove } from "./medium";
export { MctsSearch, search, searchAsync, validateConfig } from "./mcts";
export { playMatch, playSeries } from "./arena";
export type { MatchResult, SeriesTally } from "./arena";
export { DEFAULT_AI_CONFIG, STRATEGIES } from "./types";
export type {
  AiConfig,
  ChildStats,
  SearchAsyncOptions,
  SearchBudget,
  SearchNode,
  SearchResult,
  Strategy,
} from "./types";
