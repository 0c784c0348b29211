import { createApp } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🌅 Affirmation Poster - starting HTTP service...');

    try {
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        // Missing values only disable the parts that need them
        const configWarnings = validateConfig(config);
        if (configWarnings.length > 0) {
            console.warn('⚠️  Configuration is incomplete:');
            configWarnings.forEach((warning) => console.warn(`  - ${warning}`));
        }

        console.log('🚀 Initializing application components...');
        const app = createApp(config);

        app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Default variant: ${config.pipelineVariant}`);
            console.log(`   Storage: ${config.storageProvider}`);
        });
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
