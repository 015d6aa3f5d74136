export { optionalApiKey } from './auth'
export {
  getStringParam,
  parseBody,
  validateContainerId,
  validateSettingsKey,
} from './validate'
