/**
 * Generic posting used when no job source is given. Broad enough that the
 * ranking favours overall engineering quality over a specific stack.
 */
export const DEFAULT_JOB_TEMPLATE = `Software Engineer

We are looking for a software engineer to design, build and maintain reliable software.

Responsibilities:
- Design and implement features end to end, from data model to user-facing behaviour
- Write clear, tested and maintainable code
- Review code and collaborate with other engineers
- Diagnose production issues and improve system reliability and performance
- Document technical decisions

Requirements:
- Solid programming experience in at least one mainstream language
- Experience with version control, automated testing and continuous integration
- Understanding of data structures, algorithms and software design
- Experience building and consuming APIs
- Good written and verbal communication

Nice to have:
- Open source contributions
- Experience with cloud platforms and containers
- Experience with databases and distributed systems`;
