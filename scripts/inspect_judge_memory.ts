import { createContainer } from '../services/container.ts';

const preview = (text: string) => text.replace(/\s+/g, ' ').slice(0, 100);

async function run() {
    const [judgeName, ...queryWords] = process.argv.slice(2);
    if (!judgeName) {
        console.error('Usage: tsx scripts/inspect_judge_memory.ts <judge-name> [search query]');
        process.exit(1);
    }

    const container = createContainer();
    const judge = await container.registry.get(judgeName);
    const store = container.stores.get(judge.name);

    const stats = await store.getStats();
    console.log(`Judge '${judge.name}': ${judge.criterion}`);
    console.log(`Score range: ${judge.score_range.min_score}-${judge.score_range.max_score}`);
    console.log(`Principles: ${stats.total_principles} (${stats.oldest_principle ?? '-'} .. ${stats.newest_principle ?? '-'})`);
    console.log(`Examples: ${stats.total_examples} (${stats.oldest_example ?? '-'} .. ${stats.newest_example ?? '-'})`);

    const principles = await store.getAllPrinciples();
    principles.forEach((p, i) => {
        console.log(` ${i + 1}. [${p.id}] ${preview(p.text)}`);
    });

    const query = queryWords.join(' ').trim();
    if (query) {
        const examples = await store.retrieveExamples(query);
        console.log(`Search for '${query}' returned ${examples.length} examples`);
        examples.forEach((e) => {
            const score = e.expert_score === undefined ? '' : ` (expert ${e.expert_score})`;
            console.log(` - ${e.id}${score}: ${preview(e.input_text)}`);
        });
    }
}

run().then(() => {
    process.exit(0);
}).catch(err => {
    console.error('Inspection failed', err);
    process.exit(1);
});
