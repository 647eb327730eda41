import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { VoltcastServicesModule } from "./voltcast-services.module";
import { TrpcModule } from "./trpc/trpc.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env", "../.env"],
      cache: true,
    }),
    VoltcastServicesModule,
    TrpcModule,
  ],
})
export class AppModule {
}
