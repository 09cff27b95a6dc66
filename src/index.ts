#!/usr/bin/env node
import { loadConfig, validateConfig } from './config';
import { createKiosk } from './presentation/kiosk';
import { ConsoleWizard } from './presentation/ConsoleWizard';
import { InstanceGuard } from './presentation/InstanceGuard';

async function main(): Promise<void> {
    console.log('🎬 Enhance Kiosk - starting...');

    // 1. Load and validate configuration
    console.log('📋 Loading configuration...');
    const config = loadConfig();

    console.log('🔍 Validating configuration...');
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    // 2. One kiosk per machine
    const guard = new InstanceGuard(config.instanceGuardPort);
    if (!(await guard.acquire())) {
        console.log('Already running.');
        process.exit(0);
    }

    // 3. Start the pipeline and the foreground loop, then run the wizard
    console.log('🚀 Initializing kiosk components...');
    const kiosk = createKiosk(config);
    process.once('SIGINT', () => {
        kiosk.shutdown();
        process.exit(130);
    });

    console.log(`✅ Kiosk ready (engine: ${config.renderEngine}, input: ${config.inputVideoPath})`);
    kiosk.loop.start();
    kiosk.orchestrator.start();

    const finalStep = await new ConsoleWizard(kiosk.wizard, kiosk.orchestrator).run();

    kiosk.shutdown();
    await guard.release();
    process.exitCode = finalStep === 'sent' ? 0 : 1;
}

main().catch((error) => {
    console.error('💥 Fatal error:', error);
    process.exit(1);
});
