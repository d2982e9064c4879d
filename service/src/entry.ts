import { container } from '@changeplane/lib-services-framework';
import * as core from '@changeplane/service-core';

import { CoreModule } from '@changeplane/module-core';
import { startServer } from './runners/server.js';

// Initialize framework components
container.registerDefaults();

const moduleManager = new core.modules.ModuleManager();
moduleManager.register([new CoreModule()]);

// Generate Commander CLI entry point program
const { execute } = core.entry.generateEntryProgram((runnerConfig) => startServer(runnerConfig, moduleManager));

/**
 * Starts the program
 */
void execute();
