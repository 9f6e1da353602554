import type { ListProfile } from "../types";

const profileLink = (locator: string) => ({
  locator,
  attribute: "href",
  pattern: "/in/",
  stripQuery: true,
});

/** Applicant list of a job posting in a recruiter hiring workspace. */
export const HIRING_APPLICANTS_PROFILE: ListProfile = {
  id: "hiring-applicants",
  listUrlTemplate: "https://www.linkedin.com/hiring/applicants/?jobId={listId}",
  filterParam: "rating",
  filters: ["GOOD_FIT", "MAYBE", "NOT_A_FIT"],
  landingPattern: "^/hiring/",
  itemLocator: "[aria-label*=', Verified profile']",
  label: {
    attribute: "aria-label",
    affixes: [", Verified profile"],
  },
  loadMore: [
    { locator: "button", contains: "Load more" },
    "button[class*='load-more']",
    "div[class*='load-more'] button",
  ],
  listContainers: ["div[class*='hiring-applicants__list']", "[class*='applicants__list']"],
  primaryFields: {
    name: ["h1[class*='hiring']", "div[class*='profile'] h1", "[class*='applicant-name']"],
    headline: ["div[class*='headline']", "p[class*='subtitle']"],
    location: [
      "[class*='hiring-applicants__location']",
      "[class*='applicant-location']",
      "[data-test-applicant-location]",
    ],
    profileUrl: [
      profileLink("a[aria-label*='View full profile']"),
      profileLink("a[href*='/in/']"),
    ],
  },
  reveal: {
    control: [
      { locator: "button", contains: "Contact" },
      "button[aria-label='Contact']",
    ],
    fields: {
      phone: [
        { locator: "a[href^='tel:']", attribute: "href", scheme: "tel:" },
        "[class*='phone'] span",
        { locator: "div[class*='contact'] a[href^='tel:']", attribute: "href", scheme: "tel:" },
      ],
      email: [
        { locator: "a[href^='mailto:']", attribute: "href", scheme: "mailto:" },
        { locator: "[class*='email'] span", contains: "@" },
      ],
    },
  },
  dismiss: ["button[aria-label='Dismiss']", "button[class*='artdeco-modal__dismiss']"],
  profilePage: {
    urlField: "profileUrl",
    landingPattern: "^/in/",
    ready: "main h1",
    reveal: {
      control: [
        "a[href*='overlay/contact-info']",
        "a[href*='contact-info']",
        "#top-card-text-details-contact-info",
      ],
      fields: {
        email: [
          { locator: "section[class*='ci-email'] a", contains: "@" },
          { locator: "a[href^='mailto:']", attribute: "href", scheme: "mailto:" },
        ],
        phone: [
          "section[class*='ci-phone'] span",
          { locator: "a[href^='tel:']", attribute: "href", scheme: "tel:" },
        ],
        websites: [{ locator: "section[class*='ci-websites'] a", attribute: "href", multiple: true }],
        twitter: [
          "section[class*='ci-twitter'] a",
          { locator: "section[class*='ci-twitter'] a", attribute: "href" },
        ],
      },
    },
    dismiss: ["button[aria-label='Dismiss']", "button[class*='artdeco-modal__dismiss']"],
  },
};
