import { Module } from "@nestjs/common";
import { ProcessorModule } from "../processor/processor.module.js";
import { WebhookController } from "./webhook.controller.js";

@Module({
	imports: [ProcessorModule],
	controllers: [WebhookController],
})
export class WebhookModule {}
