import { getConfig } from '../src/config';
import { createRenderEngine } from '../src/presentation/kiosk';
import { AttachClient } from '../src/application/AttachClient';

async function probe() {
    const config = getConfig();
    const engine = createRenderEngine(config);

    console.log(`Probing render engine "${engine.name}"`);
    console.log(`  Installed: ${(await engine.isInstalled()) ? '✅' : '❌'}`);
    console.log(`  Running:   ${(await engine.isRunning()) ? '✅' : '❌'}`);

    const session = await new AttachClient(engine).attach(config.attachMaxAttempts, config.attachRetryDelayMs);
    console.log('✅ Attached');

    const loaded = await session.loadProject(config.projectName);
    console.log(`${loaded ? '✅' : '❌'} Project "${config.projectName}" ${loaded ? 'loads' : 'is missing'}`);
    if (!loaded) {
        console.log(`   It will be imported from ${config.templateProjectPath} on the first run.`);
    }

    await session.release?.();
}

probe().catch((error) => {
    console.error('❌ Probe failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
