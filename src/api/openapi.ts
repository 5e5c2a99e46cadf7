const pathParameter = (name: string, type: "string" | "number") => ({
  name,
  in: "path",
  required: true,
  schema: { type }
});

export function buildOpenApiDocument() {
  return {
    openapi: "3.1.0",
    info: {
      title: "Teller Desk API",
      version: "1.0.0",
      description: "Guided bank-teller conversations, progressive tax reports and schedule administration."
    },
    servers: [
      {
        url: "/v1"
      }
    ],
    components: {
      schemas: {
        ErrorResponse: {
          type: "object",
          required: ["code", "message", "details", "requestId"],
          properties: {
            code: { type: "string" },
            message: { type: "string" },
            details: {},
            requestId: { type: ["string", "null"] }
          }
        },
        TurnAction: {
          type: "object",
          required: ["type"],
          properties: {
            type: {
              type: "string",
              enum: ["PROMPT", "REPORT_READY", "TRANSFER_READY", "LOAN_READY", "REFUSED"]
            },
            text: { type: "string" },
            record: { type: "object" }
          }
        },
        TaxBracket: {
          type: "object",
          required: ["min", "max", "rate"],
          properties: {
            min: { type: "number", minimum: 0 },
            max: { type: ["number", "null"] },
            rate: { type: "number", minimum: 0, maximum: 100 }
          }
        }
      },
      securitySchemes: {
        bearerAuth: {
          type: "http",
          scheme: "bearer",
          bearerFormat: "JWT"
        }
      }
    },
    security: [
      {
        bearerAuth: []
      }
    ],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service health" }
          }
        }
      },
      "/conversations": {
        post: {
          summary: "Begin a guided conversation owned by the caller",
          responses: {
            "200": { description: "Greeting prompt" },
            "400": { description: "Validation error" },
            "403": { description: "Conversation is live and owned by another actor" }
          }
        }
      },
      "/conversations/{id}/turns": {
        post: {
          summary: "Send one message to a conversation",
          parameters: [pathParameter("id", "string")],
          responses: {
            "200": { description: "Action produced by the turn" },
            "404": { description: "No live session for the conversation" }
          }
        }
      },
      "/conversations/{id}": {
        delete: {
          summary: "Cancel a conversation",
          parameters: [pathParameter("id", "string")],
          responses: {
            "204": { description: "Session removed" },
            "403": { description: "Caller does not own the session" },
            "404": { description: "No live session for the conversation" }
          }
        }
      },
      "/rates": {
        get: {
          summary: "Current tax brackets and CEO salary rate",
          responses: {
            "200": { description: "Rate schedule" }
          }
        }
      },
      "/calculations": {
        post: {
          summary: "Roll sale quantities for up to ten products and compute the tax report",
          responses: {
            "200": { description: "Line items and report" },
            "422": { description: "Calculation rejected" }
          }
        }
      },
      "/admin/schedules/{kind}/brackets": {
        put: {
          summary: "Add a bracket or replace the bracket with the same minimum",
          parameters: [pathParameter("kind", "string")],
          responses: {
            "200": { description: "Updated schedules" },
            "403": { description: "Administrator access required" },
            "422": { description: "Configuration rejected" }
          }
        }
      },
      "/admin/schedules/{kind}/brackets/{min}": {
        delete: {
          summary: "Remove the bracket starting at min",
          parameters: [pathParameter("kind", "string"), pathParameter("min", "number")],
          responses: {
            "200": { description: "Updated schedules" },
            "403": { description: "Administrator access required" },
            "422": { description: "Configuration rejected" }
          }
        }
      },
      "/admin/derived-salary": {
        put: {
          summary: "Set the CEO salary percentage of post-tax profit",
          responses: {
            "200": { description: "Updated schedules" },
            "403": { description: "Administrator access required" },
            "422": { description: "Configuration rejected" }
          }
        }
      }
    }
  };
}
