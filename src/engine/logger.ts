import debug from 'debug';

const ROOT_NAMESPACE = 'ku-permafrost';

/**
 * Stage loggers.  Silent unless enabled through the DEBUG environment
 * variable, e.g. `DEBUG=ku-permafrost:*`.
 */
export function createStageLogger(stage: string) {
  return {
    info: debug(`${ROOT_NAMESPACE}:${stage}:info`),
    trace: debug(`${ROOT_NAMESPACE}:${stage}:trace`),
    warn: debug(`${ROOT_NAMESPACE}:${stage}:warn`),
  };
}
