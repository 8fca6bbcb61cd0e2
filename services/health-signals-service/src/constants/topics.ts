export const REFRESH_COMMAND_TOPIC = "healthsignals.service.command.refresh";

export const TOPICS = {
  articles: "healthsignals.service.event.articles",
  complaints: "healthsignals.service.event.complaints",
  pressReleases: "healthsignals.service.event.pressreleases",
  respiratory: "healthsignals.service.event.respiratory",
} as const;

export type Topic = (typeof TOPICS)[keyof typeof TOPICS];
