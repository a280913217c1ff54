import { parseUserImportRecord, usersFromCsv, usersFromJson, usersToCsv, usersToJson } from "./userTransfer";
import type { User } from "../models/user";

const users: User[] = [
  {
    id: "0000000000000A01",
    email: "alice@example.com",
    nickname: "Alice, Admin",
    isAdmin: true,
    createdAt: "2025-03-01T00:00:00.000Z",
  },
  {
    id: "0000000000000A02",
    email: "bob@example.com",
    nickname: "Bob",
    isAdmin: false,
    createdAt: "2025-03-02T00:00:00.000Z",
  },
];

describe("usersToCsv", () => {
  test("writes a header and quotes where needed", () => {
    expect(usersToCsv(users)).toBe(
      "id,email,nickname,is_admin,created_at\r\n" +
        '0000000000000A01,alice@example.com,"Alice, Admin",true,2025-03-01T00:00:00.000Z\r\n' +
        "0000000000000A02,bob@example.com,Bob,false,2025-03-02T00:00:00.000Z\r\n",
    );
  });

  test("reads back into import records", () => {
    const records = usersFromCsv(usersToCsv(users)).map((r) => parseUserImportRecord(r));
    expect(records).toEqual([
      { id: "0000000000000A01", email: "alice@example.com", nickname: "Alice, Admin", isAdmin: true, password: null },
      { id: "0000000000000A02", email: "bob@example.com", nickname: "Bob", isAdmin: false, password: null },
    ]);
  });
});

describe("usersToJson", () => {
  test("is an array of users", () => {
    expect(usersFromJson(usersToJson(users))).toEqual(users);
    expect(() => usersFromJson("not json")).toThrow(/^malformed JSON/);
  });
});

describe("parseUserImportRecord", () => {
  test("normalizes the email and keeps a password", () => {
    expect(
      parseUserImportRecord({
        id: "0000000000000A03",
        email: " Carol@Example.COM ",
        nickname: " Carol ",
        isAdmin: "yes",
        password: "test-password",
      }),
    ).toEqual({
      id: "0000000000000A03",
      email: "carol@example.com",
      nickname: "Carol",
      isAdmin: true,
      password: "test-password",
    });
  });

  test("rejects malformed records", () => {
    const ok = { id: "0000000000000A03", email: "c@example.com", nickname: "C" };
    expect(parseUserImportRecord(ok)).not.toBeNull();
    expect(parseUserImportRecord(null)).toBeNull();
    expect(parseUserImportRecord({ ...ok, id: "a03" })).toBeNull();
    expect(parseUserImportRecord({ ...ok, email: "nope" })).toBeNull();
    expect(parseUserImportRecord({ ...ok, nickname: " " })).toBeNull();
    expect(parseUserImportRecord({ ...ok, password: "  " })).toEqual({ ...ok, isAdmin: false, password: null });
  });
});
