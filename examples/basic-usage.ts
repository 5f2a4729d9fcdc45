/**
 * Adaptive Session Core - basic usage
 *
 * Starts one session, feeds it a rising signal and prints what the engine did.
 */

import { AdaptiveEngine, OutboundEventType } from '../src';

async function main(): Promise<void> {
    console.log('Adaptive Session Core - basic usage\n');

    // 1. Create the engine (in-memory archive for the demo)
    const engine = new AdaptiveEngine({
        engineId: 'demo-engine',
        storage: { sqlitePath: ':memory:' },
        scheduler: { tickIntervalMs: 2000 },
    });

    // 2. Listen to outbound events
    engine.bus.outbound.on(OutboundEventType.ADAPTATION_EMITTED, (event) => {
        console.log(`  adaptation ${event.kind} at level ${event.triggerLevel.toFixed(2)}`, event.parameters);
    });
    engine.bus.outbound.on(OutboundEventType.BREAKTHROUGH_DETECTED, (event) => {
        console.log(`  breakthrough in ${event.sessionId} at level ${event.triggerLevel.toFixed(2)}`);
    });

    engine.start();

    // 3. Start a session and push a few signal updates
    const sessionId = await engine.startSession('user-1', 'lesson-intro', 0.5);
    console.log(`Session ${sessionId} started`);

    const levels = [0.55, 0.68, 0.82, 0.9, 0.88];
    for (const [index, level] of levels.entries()) {
        await engine.pushSignal({
            id: `signal-${index}`,
            sessionId,
            level,
            activities: { executive: 0.6, memory: 0.5, sensory: 0.4 },
            timestamp: Date.now(),
        });
    }
    await engine.sessions.whenIdle(sessionId);

    // 4. Run one optimization pass by hand
    const report = await engine.tick(sessionId);
    if (report) {
        console.log(`Effectiveness ${report.estimate.effectiveness.toFixed(2)}, ${report.adaptations.length} optimization(s)`);
    }

    // 5. End the session and inspect the result
    const finalSnapshot = await engine.endSession(sessionId, { reason: 'completed', finalScore: 0.8 });
    if (finalSnapshot) {
        console.log(`Final mode ${finalSnapshot.mode}, metrics:`, finalSnapshot.performanceMetrics);
    }

    console.log('Metrics:', engine.getMetrics());
    console.log('Analytics:', engine.getSessionAnalytics());

    await engine.stop();
}

main().catch((error) => {
    console.error('Example failed:', error);
    process.exit(1);
});
