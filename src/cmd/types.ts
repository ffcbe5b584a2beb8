import { Schema } from "effect";

export const SET_ACTIVITY = "SET_ACTIVITY";

const Extra = Schema.Record({ key: Schema.String, value: Schema.Unknown });

export const ActivityButtonSchema = Schema.Struct({
  label: Schema.String,
  url: Schema.String,
});

export const ActivityTimestampsSchema = Schema.Struct({
  start: Schema.optional(Schema.Union(Schema.Number, Schema.String)),
  end: Schema.optional(Schema.Union(Schema.Number, Schema.String)),
});

/**
 * Rich-presence activity. Known fields are typed; anything else a client
 * sends (party, secrets, assets, ...) is carried through untouched.
 */
export const ActivitySchema = Schema.Struct(
  {
    application_id: Schema.optional(Schema.String),
    name: Schema.optional(Schema.String),
    details: Schema.optional(Schema.String),
    state: Schema.optional(Schema.String),
    type: Schema.optional(Schema.Number),
    timestamps: Schema.optional(ActivityTimestampsSchema),
    buttons: Schema.optional(
      Schema.Union(Schema.Array(ActivityButtonSchema), Schema.Array(Schema.String))
    ),
    instance: Schema.optional(Schema.Boolean),
    flags: Schema.optional(Schema.Number),
    metadata: Schema.optional(Extra),
  },
  Extra
);

export const ActivityCmdArgsSchema = Schema.Struct({
  pid: Schema.optional(Schema.NullOr(Schema.Number)),
  activity: Schema.optional(Schema.NullOr(ActivitySchema)),
});

/**
 * Command as received over IPC or the RPC socket. Unknown top-level keys
 * (evt, data, ...) are preserved so passthrough commands reach clients intact.
 */
export const ActivityCmdSchema = Schema.Struct(
  {
    cmd: Schema.String,
    application_id: Schema.optional(Schema.String),
    args: Schema.optional(ActivityCmdArgsSchema),
    nonce: Schema.optional(Schema.NullOr(Schema.String)),
  },
  Extra
);

export type ActivityButton = Schema.Schema.Type<typeof ActivityButtonSchema>;
export type Activity = Schema.Schema.Type<typeof ActivitySchema>;
export type ActivityCmd = Schema.Schema.Type<typeof ActivityCmdSchema>;

export const decodeActivityCmd = Schema.decodeUnknownEither(ActivityCmdSchema);
