import * as mqtt from "mqtt";
import { connect } from "amqplib";
import { config } from "./config/config";
import { wrapPayload } from "./envelope";
import { toStatePayload } from "./eventstream";

async function main() {
  // 1️⃣ RabbitMQ
  const connection = await connect(config.rabbitUrl);
  const channel = await connection.createChannel();
  await channel.assertQueue(config.queueName, { durable: true });
  console.log("✅ Connected to RabbitMQ, queue ready:", config.queueName);

  // 2️⃣ MQTT
  const mqttClient = mqtt.connect(config.mqttUrl);

  mqttClient.on("connect", () => {
    console.log("✅ Connected to MQTT");
    mqttClient.subscribe(config.subscribeTopic, { qos: 1 }, (err) => {
      if (err) {
        console.error("❌ Subscribe error:", err);
      } else {
        console.log(`📡 Subscribed to ${config.subscribeTopic}`);
      }
    });
  });

  // 3️⃣ Forwarding Home Assistant states MQTT → RabbitMQ
  mqttClient.on("message", (topic, message) => {
    const payload = message.toString();

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      console.warn(`⚠️ Skipping non-JSON payload on ${topic}`);
      return;
    }

    const state = toStatePayload(parsed);
    if (!state) return;

    const msg = wrapPayload(topic, state);
    channel.sendToQueue(config.queueName, Buffer.from(JSON.stringify(msg)), {
      persistent: true,
    });

    if (config.debug) {
      console.log(`➡️ Sent to queue: ${JSON.stringify(msg)}`);
    }
  });

  mqttClient.on("error", (err) => console.error("❌ MQTT error:", err));
  connection.on("error", (err) => console.error("❌ RabbitMQ error:", err));

  // Graceful shutdown
  const shutdown = async () => {
    console.log("👋 Shutting down collector...");
    await mqttClient.endAsync();
    await channel.close();
    await connection.close();
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

main().catch((err) => {
  console.error("❌ Collector failed:", err);
  process.exitCode = 1;
});
