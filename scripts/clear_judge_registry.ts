import { redisService } from '../services/redisService.ts';
import { KEYS } from '../services/judgeRegistryService.ts';

// Removes judge configurations only; Chroma collections are left in place
async function clearRegistry() {
    console.log('Starting judge registry cleanup...');

    const pattern = `${KEYS.JUDGE_PREFIX}*`;
    console.log(`Scanning for pattern: ${pattern}`);

    const found = await redisService.request(['KEYS', pattern]);
    const keys = Array.isArray(found) ? found.filter((k): k is string => typeof k === 'string') : [];

    let totalDeleted = 0;
    // Delete in batches of 1000 to avoid blocking
    for (let i = 0; i < keys.length; i += 1000) {
        const batch = keys.slice(i, i + 1000);
        await redisService.request(['DEL', ...batch]);
        totalDeleted += batch.length;
    }

    console.log(`Clearing set: ${KEYS.JUDGES_SET}`);
    const exists = await redisService.request(['EXISTS', KEYS.JUDGES_SET]);
    if (Number(exists) > 0) {
        await redisService.request(['DEL', KEYS.JUDGES_SET]);
        totalDeleted++;
    }

    console.log(`Cleanup complete. Total keys deleted: ${totalDeleted}`);
}

clearRegistry().then(() => {
    process.exit(0);
}).catch(err => {
    console.error('Cleanup failed', err);
    process.exit(1);
});
