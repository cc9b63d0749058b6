
import { connect } from "amqplib";
import type { ConsumeMessage } from "amqplib";
import { MessageBatcher } from "./batcher";
import { config } from "./config/config";
import { extractPayload } from "./envelope";
import { EventBatchProcessor, batchError, summarizeBatch } from "./processor";
import { createTwinStore } from "./twinStore";

async function startWriter() {
  // Twin registry
  const store = await createTwinStore(config);
  const processor = new EventBatchProcessor({ store, debug: config.debug });

  // RabbitMQ
  const connection = await connect(config.rabbitUrl);
  const channel = await connection.createChannel();
  await channel.assertQueue(config.queueName, { durable: true });
  await channel.prefetch(config.batch.size);
  console.log("✅ Connected to RabbitMQ, waiting for messages...");

  const batcher = new MessageBatcher<ConsumeMessage>({
    maxSize: config.batch.size,
    windowMs: config.batch.windowMs,
    handler: async (messages) => {
      const report = await processor.processBatch(messages.map((msg) => extractPayload(msg.content)));

      // Failed events are reported, not redelivered.
      for (const msg of messages) channel.ack(msg);

      const counts = summarizeBatch(report);
      console.log(
        `💾 Batch of ${messages.length}: ${counts.updated} updated, ${counts.created} created, ` +
          `${counts.initialized} initialized, ${counts.skipped} skipped, ${counts.failed} failed`,
      );

      const failure = batchError(report);
      if (failure) {
        console.error("❌ Batch finished with failures:", failure);
      }
    },
    onError: (err, messages) => {
      console.error("❌ Batch could not be processed:", err);
      for (const msg of messages) channel.nack(msg, false, false);
    },
  });

  const { consumerTag } = await channel.consume(config.queueName, (msg) => {
    if (!msg) return;
    batcher.push(msg);
  });

  connection.on("error", (err) => console.error("❌ RabbitMQ error:", err));

  // Graceful shutdown
  const shutdown = async () => {
    console.log("👋 Shutting down writer...");
    await channel.cancel(consumerTag);
    await batcher.stop();
    await channel.close();
    await connection.close();
    await store.close?.();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown().catch((err) => {
        console.error("❌ Shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

startWriter().catch((err) => {
  console.error("❌ Writer failed:", err);
  process.exitCode = 1;
});
