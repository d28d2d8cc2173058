export {
  declaresSelfHosted,
  mentionsSelfHosted,
  runsOnSelfHosted,
  SELF_HOSTED_LABEL,
  WorkflowClassifier,
  type WorkflowSource,
} from './classifier.js';
