import { startStatsServer } from "../composition/root";

if (require.main === module) {
  startStatsServer(Number(process.env.PORT ?? 3000));
}
