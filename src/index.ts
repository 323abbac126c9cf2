import { createApp } from './app.js';
import { DEBUG_LOGGING, loadConfig } from './config.js';
import { ensureScratchDirs } from './slicing/slicing.service.js';

const config = loadConfig();

await ensureScratchDirs(config);

if (DEBUG_LOGGING) console.log(`Upload directory: ${config.uploadDir}, output directory: ${config.outputDir}`);

const app = createApp(config);

app.listen(config.port, () => {
	console.log(`Server is running on port ${config.port}, slicer: ${config.slicerPath}, environment: ${process.env.NODE_ENV || 'production'}`);
});
