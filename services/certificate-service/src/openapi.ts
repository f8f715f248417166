const pathParam = (name: string) => ({
  in: "path",
  name,
  required: true,
  schema: { type: "string" },
});

const actorHeader = {
  in: "header",
  name: "x-actor-id",
  required: true,
  schema: { type: "string" },
};

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Veterinary Health Certificate Service API",
      version: "1.0.0",
      description: "Medical record signing, health certificate issuance, QR export and QR verification.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/records": {
        post: {
          summary: "Create a medical record, signing it when a vet password is given",
          parameters: [actorHeader],
          responses: {
            "201": { description: "Record created" },
            "400": { description: "Invalid request" },
            "403": { description: "No access to the pet" },
            "404": { description: "Pet or actor not found" },
          },
        },
      },
      "/records/{recordId}": {
        get: {
          summary: "Get a medical record",
          parameters: [actorHeader, pathParam("recordId")],
          responses: {
            "200": { description: "Record found" },
            "403": { description: "No access to the pet" },
            "404": { description: "Record not found" },
          },
        },
        patch: {
          summary: "Update type or description of an unsigned, mutable record",
          parameters: [actorHeader, pathParam("recordId")],
          responses: {
            "200": { description: "Record updated" },
            "400": { description: "Invalid request" },
            "403": { description: "Not the creator or a peer of the creating clinic" },
            "404": { description: "Record not found" },
            "409": { description: "Record is signed, immutable, or a vaccine" },
          },
        },
        delete: {
          summary: "Delete a mutable record",
          parameters: [actorHeader, pathParam("recordId")],
          responses: {
            "204": { description: "Record deleted" },
            "403": { description: "Not allowed to delete the record" },
            "404": { description: "Record not found" },
            "409": { description: "Record is immutable" },
          },
        },
      },
      "/pets/{petId}/records": {
        get: {
          summary: "List a pet's medical records, newest first",
          parameters: [actorHeader, pathParam("petId")],
          responses: {
            "200": { description: "Records listed" },
            "403": { description: "No access to the pet" },
            "404": { description: "Pet not found" },
          },
        },
      },
      "/certificates": {
        post: {
          summary: "Issue a signed health certificate from the pet's latest valid rabies vaccine",
          parameters: [actorHeader],
          responses: {
            "201": { description: "Certificate issued" },
            "400": { description: "Invalid request" },
            "403": { description: "Vet may not issue for this pet" },
            "404": { description: "Vet, pet or clinic not found" },
            "409": { description: "Certificate already exists for record or number" },
            "422": { description: "No valid rabies vaccine or recent checkup" },
            "500": { description: "Hashing or signing failed" },
          },
        },
      },
      "/certificates/verify": {
        post: {
          summary: "Verify a scanned QR token against its embedded hash and issuer signatures",
          responses: {
            "200": { description: "Verification result" },
            "400": { description: "Invalid request" },
            "422": { description: "QR data could not be decoded" },
          },
        },
      },
      "/certificates/{certificateId}": {
        get: {
          summary: "Get certificate by ID",
          parameters: [actorHeader, pathParam("certificateId")],
          responses: {
            "200": { description: "Certificate found" },
            "403": { description: "No access to the pet" },
            "404": { description: "Certificate not found" },
          },
        },
      },
      "/certificates/{certificateId}/qr": {
        get: {
          summary: "Export the certificate as an HC1 QR token",
          parameters: [actorHeader, pathParam("certificateId")],
          responses: {
            "200": { description: "QR data generated" },
            "403": { description: "No access to the pet" },
            "404": { description: "Certificate not found" },
            "500": { description: "Encoding failed" },
          },
        },
      },
      "/pets/{petId}/certificates": {
        get: {
          summary: "List a pet's certificates, newest first",
          parameters: [actorHeader, pathParam("petId")],
          responses: {
            "200": { description: "Certificates listed" },
            "403": { description: "No access to the pet" },
            "404": { description: "Pet not found" },
          },
        },
      },
    },
  };
}
