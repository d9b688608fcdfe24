import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CalendarDate } from "@my-app/rest-api";
import type { Tag } from "@my-app/core/database";
import { createTestApi, type TestApi } from "../../test-utils.js";

describe("date_tags group", () => {
  let api: TestApi;
  let token: string;
  let travel: Tag;

  beforeEach(() => {
    api = createTestApi();
    token = api.tokenFor(api.user, ["date_tags.*"]);
    travel = api.managers.tags.create(api.user, { title: "Travel" });
  });

  afterEach(() => {
    api.close();
  });

  it("attaches a tag to a date", async () => {
    const res = await api.call("POST", "date_tags/date_tag", {
      token,
      body: { date: "2024-06-01", tagId: travel.id },
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      type: 3,
      data: { date: "2024-06-01", tagId: travel.id, tagTitle: "Travel" },
    });
  });

  it("rejects an impossible date", async () => {
    const res = await api.call("POST", "date_tags/date_tag", {
      token,
      body: { date: "2024-02-30", tagId: travel.id },
    });

    expect(res.status).toBe(400);
  });

  it("answers 404 for a tag of another user", async () => {
    const foreign = api.managers.tags.create(api.admin, { title: "Travel" });

    const res = await api.call("POST", "date_tags/date_tag", {
      token,
      body: { date: "2024-06-01", tagId: foreign.id },
    });

    expect(res.status).toBe(404);
  });

  it("lists date tags of one date", async () => {
    api.managers.dateTags.create(api.user, { date: CalendarDate.of(2024, 6, 1), tagId: travel.id });
    api.managers.dateTags.create(api.user, { date: CalendarDate.of(2024, 6, 2), tagId: travel.id });

    const all = await api.call("GET", "date_tags/date_tags", { token });
    const one = await api.call("GET", "date_tags/date_tags/2024-06-02", { token });

    expect(all.body).toMatchObject({ type: 2, total_items: 2 });
    expect(one.body).toMatchObject({
      type: 2,
      total_items: 1,
      data: [{ date: "2024-06-02", tagTitle: "Travel" }],
    });
  });

  it("rejects an impossible date in the URL", async () => {
    const res = await api.call("GET", "date_tags/date_tags/2024-13-01", { token });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error_message: "Invalid date: 2024-13-01" });
  });

  it("retrieves and deletes a date tag by ID", async () => {
    const dateTag = api.managers.dateTags.create(api.user, {
      date: CalendarDate.of(2024, 6, 1),
      tagId: travel.id,
    });

    const found = await api.call("GET", `date_tags/date_tags/${dateTag.id}`, { token });
    const removed = await api.call("DELETE", `date_tags/date_tag/${dateTag.id}`, { token });
    const gone = await api.call("GET", `date_tags/date_tags/${dateTag.id}`, { token });

    expect(found.body).toMatchObject({ type: 3, data: { id: dateTag.id } });
    expect(removed.body).toMatchObject({ data: { deleted: true } });
    expect(gone.status).toBe(404);
    expect(gone.body).toMatchObject({
      error_message: `Date tag with ID ${dateTag.id} is not found.`,
    });
  });
});
