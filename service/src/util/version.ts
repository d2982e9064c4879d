import { logger } from '@changeplane/lib-services-framework';

import { CONTROL_PLANE_VERSION } from '@changeplane/service-core';

export function logBooting(runner: string) {
  const version = CONTROL_PLANE_VERSION;
  logger.info(`Booting control plane v${version}, ${runner}`, { version, runner });
}
