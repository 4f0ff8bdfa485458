export {
  ConsensusEngine,
  createConsensusEngine,
  buildRolePrompt,
  buildJudgePrompt,
  toVote,
  CONSENSUS_UNAVAILABLE,
  type ConsensusEngineOptions,
} from './consensus-engine.js';
