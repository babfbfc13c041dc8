export { resolveRemoteUrl, normalizeRemoteUrl, DEFAULT_REMOTE_NAME } from './remote_resolver';
