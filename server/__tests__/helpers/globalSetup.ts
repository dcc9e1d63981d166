// Every suite runs outside UTC so that timestamp handling cannot lean on the host zone.
export default function globalSetup(): void {
  process.env.TZ = "America/New_York";
}
