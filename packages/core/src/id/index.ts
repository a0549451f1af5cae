export {
  TASK_ID_PREFIX,
  BASE36_CHARS,
  TASK_HASH_LENGTH,
  GENERATED_TASK_ID_PATTERN,
  toBase36,
  generateTaskId,
  isGeneratedTaskId,
  type TaskIdInput,
} from './generator.js';
