import { describe, it, expect } from "vitest";
import {
  classifyEnquiry,
  isGroupEnquiry,
  isSpecialRequest,
  largestCount,
} from "../../src/enquiry/classifier.js";

describe("largestCount", () => {
  it("finds head counts", () => {
    expect(largestCount("We need 25 tickets, maybe 30")).toBe(30);
  });

  it("ignores phone numbers", () => {
    expect(largestCount("Call me on +852 5555 0101")).toBeNull();
  });

  it("ignores prices, times and percentages", () => {
    expect(largestCount("Tickets are $150 each")).toBeNull();
    expect(largestCount("Doors open at 19:30")).toBeNull();
    expect(largestCount("Is there 50% off?")).toBeNull();
  });

  it("skips years", () => {
    expect(largestCount("In March 2027 with 40 people")).toBe(40);
  });

  it("ignores single digits", () => {
    expect(largestCount("2 seats please")).toBeNull();
  });
});

describe("isGroupEnquiry", () => {
  it("spots group words", () => {
    expect(isGroupEnquiry("Booking for a party of 8")).toBe(true);
    expect(isGroupEnquiry("Our company would like to attend")).toBe(true);
  });

  it("uses the group size threshold", () => {
    expect(isGroupEnquiry("Tickets for 12 people")).toBe(false);
    expect(isGroupEnquiry("Tickets for 20 people")).toBe(true);
  });
});

describe("isSpecialRequest", () => {
  it("spots accessibility and VIP requests", () => {
    expect(isSpecialRequest("Is the venue wheelchair accessible?")).toBe(true);
    expect(isSpecialRequest("Do you have VIP packages?")).toBe(true);
    expect(isSpecialRequest("What time does it start?")).toBe(false);
  });
});

describe("classifyEnquiry", () => {
  it("puts group bookings before special requests", () => {
    expect(classifyEnquiry("A school outing for 30 kids, two need wheelchair access", "event")).toBe(
      "group_booking",
    );
  });

  it("classifies special requests", () => {
    expect(classifyEnquiry("Any dietary options at the dinner?", "merchant")).toBe("special_request");
  });

  it("defaults by how the enquiry is addressed", () => {
    expect(classifyEnquiry("Can I book two seats?", "event")).toBe("ticket_booking");
    expect(classifyEnquiry("Can I book two seats?", "merchant")).toBe("custom_booking");
  });
});
